import { DockerfileError } from './errors';
import { LogicalLine } from './types';

interface QuoteState {
  quote: '"' | "'" | null;
  escaped: boolean;
}

const HEREDOC_INSTRUCTIONS = new Set(['RUN', 'COPY', 'ADD']);

interface HeredocMarker {
  delimiter: string;
  stripTabs: boolean;
}

// Advances the quote state by one character; true when it sits outside quotes unescaped
function stepQuotes(ch: string, state: QuoteState): boolean {
  if (state.escaped) {
    state.escaped = false;
    return false;
  }
  if (state.quote === "'") {
    if (ch === "'") state.quote = null;
    return false;
  }
  if (ch === '\\') {
    state.escaped = true;
    return false;
  }
  if (state.quote === '"') {
    if (ch === '"') state.quote = null;
    return false;
  }
  if (ch === '"' || ch === "'") {
    state.quote = ch;
    return false;
  }
  return true;
}

function scanQuotes(text: string, state: QuoteState): void {
  for (let i = 0; i < text.length; i++) stepQuotes(text[i], state);
}

/**
 * Extract heredoc delimiters from a Dockerfile instruction. Only a `<<`
 * outside quotes starts a heredoc.
 * Supports: <<EOF, <<"EOF", <<'EOF', <<-EOF, <<-"EOF", <<-'EOF'
 */
function extractHeredocMarkers(line: string): HeredocMarker[] {
  const state: QuoteState = { quote: null, escaped: false };
  const bare: boolean[] = [];
  for (let i = 0; i < line.length; i++) bare.push(stepQuotes(line[i], state));

  const markers: HeredocMarker[] = [];
  const regex = /<<(-?)\s*(?:"([^"]+)"|'([^']+)'|([A-Za-z_][A-Za-z0-9_]*))/g;
  let m: RegExpExecArray | null;
  while ((m = regex.exec(line)) !== null) {
    if (!bare[m.index]) continue;
    markers.push({ delimiter: m[2] ?? m[3] ?? m[4], stripTabs: m[1] === '-' });
  }
  return markers;
}

// An odd run of trailing backslashes ends in an unescaped one
function endsWithContinuation(text: string): boolean {
  let count = 0;
  for (let i = text.length - 1; i >= 0 && text[i] === '\\'; i--) count++;
  return count % 2 === 1;
}

export function keywordOf(value: string): string {
  return value.split(/\s/, 1)[0].toUpperCase();
}

export function tokenize(content: string): LogicalLine[] {
  const lines = content.split('\n').map(l => (l.endsWith('\r') ? l.slice(0, -1) : l));
  const result: LogicalLine[] = [];
  let i = 0;

  while (i < lines.length) {
    const trimmed = lines[i].trim();
    if (trimmed === '' || trimmed.startsWith('#')) {
      i++;
      continue;
    }

    const startLine = i + 1;
    const rawLines = [lines[i]];
    const quotes: QuoteState = { quote: null, escaped: false };
    let segment = lines[i].trimStart();
    let value = '';

    for (;;) {
      let body = segment.trimEnd();
      const continues = endsWithContinuation(body);
      if (continues) body = body.slice(0, -1);
      scanQuotes(body, quotes);
      value += body;
      if (!continues) break;

      i++;
      // Comments and blank lines inside a continuation are skipped unless quoted
      while (i < lines.length && quotes.quote === null) {
        const next = lines[i].trim();
        if (next !== '' && !next.startsWith('#')) break;
        rawLines.push(lines[i]);
        i++;
      }
      if (i >= lines.length) break;
      rawLines.push(lines[i]);
      segment = lines[i].trimStart();
    }
    i++;

    value = value.trim();
    const keyword = keywordOf(value);
    if (quotes.quote !== null) {
      throw new DockerfileError('MalformedInstruction', `unterminated ${quotes.quote} quote`, startLine, keyword);
    }

    const heredocs: string[] = [];
    if (HEREDOC_INSTRUCTIONS.has(keyword)) {
      for (const marker of extractHeredocMarkers(value)) {
        const body: string[] = [];
        let closed = false;
        while (i < lines.length) {
          const bodyLine = lines[i];
          rawLines.push(bodyLine);
          i++;
          const candidate = marker.stripTabs ? bodyLine.replace(/^\t+/, '') : bodyLine;
          if (candidate.trim() === marker.delimiter) {
            closed = true;
            break;
          }
          body.push(candidate);
        }
        if (!closed) {
          throw new DockerfileError('MalformedInstruction', `unterminated heredoc '${marker.delimiter}'`, startLine, keyword);
        }
        heredocs.push(body.join('\n'));
      }
    }

    result.push({ line: startLine, value, raw: rawLines.join('\n'), heredocs });
  }

  return result;
}
