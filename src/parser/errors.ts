export type DockerfileErrorKind =
  | 'EmptyInput'
  | 'MalformedInstruction'
  | 'InvalidStageReference'
  | 'InvalidImageReference';

/**
 * Terminal failure for a single analysis call. Extractors throw it without a
 * location; the analyzer attaches the offending instruction via `locate`.
 */
export class DockerfileError extends Error {
  readonly kind: DockerfileErrorKind;
  readonly reason: string;
  readonly line?: number;
  readonly keyword?: string;

  constructor(kind: DockerfileErrorKind, reason: string, line?: number, keyword?: string) {
    super(formatMessage(reason, line, keyword));
    this.name = 'DockerfileError';
    this.kind = kind;
    this.reason = reason;
    this.line = line;
    this.keyword = keyword;
  }

  locate(line: number, keyword: string): DockerfileError {
    if (this.line !== undefined) return this;
    return new DockerfileError(this.kind, this.reason, line, keyword);
  }
}

function formatMessage(reason: string, line?: number, keyword?: string): string {
  const parts: string[] = [];
  if (line !== undefined) parts.push(`line ${line}`);
  if (keyword) parts.push(keyword);
  parts.push(reason);
  return parts.join(': ');
}

export function malformed(reason: string): DockerfileError {
  return new DockerfileError('MalformedInstruction', reason);
}
