import { DockerfileError, DockerfileErrorKind } from '../parser/errors';
import { Analysis } from '../engine/types';
import { AnalysisDict, toDict } from '../engine/serialize';

export type FileResult =
  | { filename: string; ok: true; analysis: Analysis }
  | { filename: string; ok: false; error: DockerfileError };

export interface FailureEntry {
  kind: DockerfileErrorKind;
  line: number | null;
  keyword: string | null;
  reason: string;
}

export type ResultEntry =
  | { file: string; analysis: AnalysisDict }
  | { file: string; error: FailureEntry };

function toEntry(result: FileResult): ResultEntry {
  if (result.ok) {
    return { file: result.filename, analysis: toDict(result.analysis) };
  }
  const { error } = result;
  return {
    file: result.filename,
    error: { kind: error.kind, line: error.line ?? null, keyword: error.keyword ?? null, reason: error.reason },
  };
}

export function formatJSON(analysis: Analysis, filename: string, indent = 2): string {
  return JSON.stringify(toEntry({ filename, ok: true, analysis }), null, indent);
}

/**
 * Format multiple file results as a single JSON array.
 * This ensures valid JSON output when processing multiple files.
 */
export function formatJSONBatch(results: FileResult[], indent = 2): string {
  return JSON.stringify(results.map(toEntry), null, indent);
}
