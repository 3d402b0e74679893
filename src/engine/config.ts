import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';

export type OutputFormat = 'text' | 'json';

export interface InsightConfig {
  format: OutputFormat;
  indent: number;
  color: boolean;
}

const DEFAULT_CONFIG: InsightConfig = {
  format: 'text',
  indent: 2,
  color: true,
};

const SEARCH_PATHS = [
  '.dockerfile-insightrc.yaml',
  '.dockerfile-insightrc.yml',
  '.dockerfile-insightrc.json',
  '.dockerfile-insightrc',
];

export class ConfigError extends Error {
  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'ConfigError';
  }
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function validate(file: string, raw: unknown): Partial<InsightConfig> {
  if (raw === null || raw === undefined) return {};
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(file, 'expected a mapping at the top level');
  }

  const result: Partial<InsightConfig> = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  const format = entries.get('format');
  if (format !== undefined) {
    if (!isOutputFormat(format)) throw new ConfigError(file, `invalid format '${String(format)}'`);
    result.format = format;
  }

  const indent = entries.get('indent');
  if (indent !== undefined) {
    if (typeof indent !== 'number' || !Number.isInteger(indent) || indent < 0) {
      throw new ConfigError(file, 'indent must be a non-negative integer');
    }
    result.indent = indent;
  }

  const color = entries.get('color');
  if (color !== undefined) {
    if (typeof color !== 'boolean') throw new ConfigError(file, 'color must be true or false');
    result.color = color;
  }

  return result;
}

export function loadConfig(configPath?: string, cwd = process.cwd()): InsightConfig {
  const searchPaths = configPath ? [configPath] : SEARCH_PATHS;

  for (const p of searchPaths) {
    const resolved = path.resolve(cwd, p);
    if (!fs.existsSync(resolved)) {
      if (configPath) throw new ConfigError(p, 'file not found');
      continue;
    }

    const content = fs.readFileSync(resolved, 'utf-8');
    let raw: unknown;
    try {
      raw = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(p, err instanceof Error ? err.message : String(err));
    }
    return { ...DEFAULT_CONFIG, ...validate(p, raw) };
  }

  return { ...DEFAULT_CONFIG };
}
