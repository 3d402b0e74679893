import { keywordOf, tokenize } from './lexer';
import { DockerfileError, malformed } from './errors';
import { unquote } from './key-value';
import { CopyInstruction, FromInstruction, Instruction, InstructionType } from './types';

type KnownType = Exclude<InstructionType, 'UNKNOWN'>;

const VALID_INSTRUCTIONS = new Set<string>([
  'FROM', 'RUN', 'CMD', 'LABEL', 'EXPOSE', 'ENV', 'ADD', 'COPY',
  'ENTRYPOINT', 'VOLUME', 'USER', 'WORKDIR', 'ARG', 'ONBUILD',
  'STOPSIGNAL', 'HEALTHCHECK', 'SHELL', 'MAINTAINER',
]);

const FORBIDDEN_TRIGGERS = new Set(['ONBUILD', 'FROM', 'MAINTAINER']);

const STAGE_NAME = /^[a-zA-Z][a-zA-Z0-9_.-]*$/;

function isKnown(keyword: string): keyword is KnownType {
  return VALID_INSTRUCTIONS.has(keyword);
}

interface InstructionBase {
  keyword: string;
  line: number;
  arguments: string;
  raw: string;
}

export interface ParsedFlags {
  flags: Record<string, string>;
  /** Flags written without `=value` */
  bare: Set<string>;
  rest: string;
}

export function parseFlags(args: string): ParsedFlags {
  const flags: Record<string, string> = {};
  const bare = new Set<string>();
  let rest = args.trim();
  // Flags take their value with `=`; a bare `--link` is a boolean
  const flagRegex = /^--([a-zA-Z][a-zA-Z0-9-]*)(?:=(\S*))?(?:\s+|$)/;

  while (rest.startsWith('--')) {
    const m = rest.match(flagRegex);
    if (!m) break;
    if (m[2] === undefined) bare.add(m[1]);
    flags[m[1]] = m[2] === undefined ? 'true' : unquote(m[2]);
    rest = rest.slice(m[0].length);
  }
  return { flags, bare, rest };
}

function parseFromArgs(base: InstructionBase): FromInstruction {
  const { flags, rest } = parseFlags(base.arguments);
  const parts = rest.split(/\s+/).filter(Boolean);
  if (parts.length === 0) throw malformed('missing base image');

  let alias: string | undefined;
  if (parts.length === 3 && parts[1].toUpperCase() === 'AS') {
    if (!STAGE_NAME.test(parts[2])) throw malformed(`invalid stage name '${parts[2]}'`);
    alias = parts[2].toLowerCase();
  } else if (parts.length !== 1) {
    throw malformed(`expected '<image> [AS <name>]', got '${rest}'`);
  }

  return { ...base, type: 'FROM', flags, image: parts[0], alias, platform: flags['platform'] };
}

function parseCopyArgs(type: 'COPY' | 'ADD', base: InstructionBase): CopyInstruction {
  const { flags, bare } = parseFlags(base.arguments);
  const from = flags['from'];
  if (bare.has('from')) throw malformed('missing --from value');
  if (from === '') throw malformed('empty --from value');
  return { ...base, type, flags, from };
}

export function parseInstruction(value: string, line: number, raw = value): Instruction {
  const m = value.trim().match(/^(\S+)(?:\s+([\s\S]*))?$/);
  if (!m) throw malformed('empty instruction');

  const keyword = m[1].toUpperCase();
  const base: InstructionBase = { keyword, line, arguments: m[2] ?? '', raw };

  if (!isKnown(keyword)) {
    return { ...base, type: 'UNKNOWN' };
  }

  switch (keyword) {
    case 'FROM': return parseFromArgs(base);
    case 'COPY': return parseCopyArgs('COPY', base);
    case 'ADD': return parseCopyArgs('ADD', base);
    case 'ONBUILD': {
      if (base.arguments.trim() === '') throw malformed('missing trigger instruction');
      const trigger = parseInstruction(base.arguments, line);
      if (FORBIDDEN_TRIGGERS.has(trigger.keyword)) {
        throw malformed(`${trigger.keyword} is not allowed as an ONBUILD trigger`);
      }
      return { ...base, type: 'ONBUILD', trigger };
    }
    default:
      return { ...base, type: keyword };
  }
}

export function parse(content: string): Instruction[] {
  const lines = tokenize(content);
  if (lines.length === 0) {
    throw new DockerfileError('EmptyInput', 'no instructions found');
  }

  return lines.map(l => {
    try {
      return parseInstruction(l.value, l.line, l.raw);
    } catch (err) {
      if (err instanceof DockerfileError) throw err.locate(l.line, keywordOf(l.value));
      throw err;
    }
  });
}
