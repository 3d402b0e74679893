import { DockerfileError } from '../parser/errors';
import { ImageReference } from '../parser/types';
import { Analysis } from '../engine/types';

const COLORS = {
  error: '\x1b[31m',
  stage: '\x1b[36m',
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
};

function list(values: string[]): string {
  return values.length > 0 ? values.join(', ') : '-';
}

function pairs(map: Map<string, string | undefined>): string {
  const entries = [...map].map(([k, v]) => (v === undefined ? k : `${k}=${v}`));
  return list(entries);
}

function describeImage(image: ImageReference, useColor: boolean): string {
  if (image.components) return image.full;
  return useColor ? `${COLORS.stage}${image.full} (stage)${COLORS.reset}` : `${image.full} (stage)`;
}

export function formatTTY(analysis: Analysis, filename: string, useColor = true): string {
  const msa = analysis.multistageAnalysis;
  const stats = analysis.instructions;
  const stageSuffix = analysis.stageNames.length > 0 ? ` (${analysis.stageNames.join(', ')})` : '';
  const byType = [...stats.byType].map(([type, count]) => `${type} ${count}`).join(', ');

  const rows: Array<[string, string]> = [
    ['stages', `${analysis.numStages}${stageSuffix}`],
    ['images', list(analysis.images.map(img => describeImage(img, useColor)))],
    ['multistage', msa.isMultistage ? 'yes' : 'no'],
    ['copied from', list(analysis.copyFromStages)],
    ['added from', list(analysis.addFromStages)],
    ['unused stages', list(msa.unusedStages)],
    ['exposed ports', list(analysis.exposedPorts)],
    ['instructions', `${stats.totalCount} (${byType})`],
    ['args', pairs(analysis.args)],
    ['labels', pairs(analysis.labels)],
    ['env', pairs(analysis.envVars)],
  ];

  const lines: string[] = [useColor ? `${COLORS.bold}${filename}${COLORS.reset}` : filename];
  for (const [label, value] of rows) {
    lines.push(useColor ? `  ${COLORS.dim}${label}:${COLORS.reset} ${value}` : `  ${label}: ${value}`);
  }
  return lines.join('\n') + '\n';
}

export function formatFailure(error: DockerfileError, filename: string, useColor = true): string {
  const location = error.line !== undefined ? `${filename}:${error.line}` : filename;
  const kind = useColor ? `${COLORS.error}${error.kind}${COLORS.reset}` : error.kind;
  const detail = error.keyword ? `${error.keyword}: ${error.reason}` : error.reason;
  return `${location} ${kind} ${detail}\n`;
}
