#!/usr/bin/env node

import * as fs from 'fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { analyzeDockerfile } from './engine/analyzer';
import { ConfigError, InsightConfig, isOutputFormat, loadConfig } from './engine/config';
import { DockerfileError } from './parser/errors';
import { FileResult, formatJSONBatch } from './formatter/json';
import { formatFailure, formatTTY } from './formatter/tty';

const VERSION = '0.1.0';

export interface CLIOptions {
  stdin?: boolean;
  format?: string;
  config?: string;
  indent?: number;
  color: boolean;
}

export function processContent(content: string, filename: string): FileResult {
  try {
    return { filename, ok: true, analysis: analyzeDockerfile(content) };
  } catch (err) {
    if (err instanceof DockerfileError) return { filename, ok: false, error: err };
    throw err;
  }
}

function parseIndent(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Indent must be a non-negative integer.');
  }
  return n;
}

function outputResults(results: FileResult[], config: InsightConfig, useColor: boolean): void {
  if (config.format === 'json') {
    console.log(formatJSONBatch(results, config.indent));
    return;
  }
  for (const result of results) {
    if (result.ok) {
      console.log(formatTTY(result.analysis, result.filename, useColor));
    } else {
      console.error(formatFailure(result.error, result.filename, useColor));
    }
  }
}

/** Returns the process exit code: 0 ok, 1 analysis failure, 2 usage or I/O error. */
export function analyzeFiles(files: string[], options: CLIOptions): number {
  let config: InsightConfig;
  try {
    config = loadConfig(options.config);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  const format = options.format ?? config.format;
  if (!isOutputFormat(format)) {
    console.error(`Error: Unknown format: ${format}`);
    return 2;
  }
  config = { ...config, format, indent: options.indent ?? config.indent };
  const useColor = options.color && config.color && process.stdout.isTTY === true;

  const results: FileResult[] = [];
  let maxExit = 0;

  if (options.stdin) {
    results.push(processContent(fs.readFileSync(0, 'utf-8'), '<stdin>'));
  } else if (files.length === 0) {
    console.error('Error: No Dockerfile specified. Use --stdin or provide file paths.');
    return 2;
  }

  for (const file of files) {
    if (!fs.existsSync(file)) {
      console.error(`Error: File not found: ${file}`);
      maxExit = 2;
      continue;
    }
    results.push(processContent(fs.readFileSync(file, 'utf-8'), file));
  }

  outputResults(results, config, useColor);
  if (results.some(r => !r.ok)) maxExit = Math.max(maxExit, 1);
  return maxExit;
}

export function buildProgram(): Command {
  return new Command()
    .name('dockerfile-insight')
    .description('Report stages, base images, instruction counts and declared configuration of Dockerfiles')
    .version(VERSION, '-v, --version')
    .argument('[files...]', 'Dockerfiles to analyze')
    .option('--stdin', 'Read a Dockerfile from stdin')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']))
    .option('-c, --config <path>', 'Config file path')
    .option('--indent <n>', 'JSON indentation', parseIndent)
    .option('--no-color', 'Disable colored output')
    .action((files: string[], options: CLIOptions) => {
      process.exitCode = analyzeFiles(files, options);
    });
}

if (require.main === module) {
  buildProgram().parse();
}
