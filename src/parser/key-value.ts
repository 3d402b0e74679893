import { malformed } from './errors';

export interface KeyValuePair {
  key: string;
  value: string;
}

export interface ArgPair {
  name: string;
  defaultValue?: string;
}

/**
 * Split on whitespace outside quotes. Quotes and escapes are kept so the
 * caller can still find an unquoted `=`.
 */
export function splitWords(s: string): string[] {
  const words: string[] = [];
  let current = '';
  let inQuote: string | null = null;
  let escape = false;

  for (const ch of s) {
    if (escape) { current += ch; escape = false; continue; }
    if (ch === '\\' && inQuote !== "'") { current += ch; escape = true; continue; }
    if (inQuote) {
      if (ch === inQuote) inQuote = null;
      current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") { inQuote = ch; current += ch; continue; }
    if (/\s/.test(ch)) {
      if (current) { words.push(current); current = ''; }
      continue;
    }
    current += ch;
  }
  if (current) words.push(current);
  return words;
}

/**
 * Remove quotes and apply escapes. Inside double quotes only `\"`, `\\` and
 * `\$` are escapes; other backslashes stay literal.
 */
export function unquote(word: string): string {
  let out = '';
  let inQuote: string | null = null;

  for (let i = 0; i < word.length; i++) {
    const ch = word[i];
    if (inQuote === "'") {
      if (ch === "'") inQuote = null;
      else out += ch;
      continue;
    }
    if (inQuote === '"') {
      if (ch === '"') { inQuote = null; continue; }
      if (ch === '\\' && i + 1 < word.length && '"\\$'.includes(word[i + 1])) {
        out += word[++i];
        continue;
      }
      out += ch;
      continue;
    }
    if (ch === '\\') {
      if (i + 1 < word.length) out += word[++i];
      continue;
    }
    if (ch === '"' || ch === "'") { inQuote = ch; continue; }
    out += ch;
  }
  return out;
}

/** Index of the first `=` outside quotes, or -1. */
function unquotedEquals(word: string): number {
  let inQuote: string | null = null;
  for (let i = 0; i < word.length; i++) {
    const ch = word[i];
    if (inQuote === "'") { if (ch === "'") inQuote = null; continue; }
    if (ch === '\\') { i++; continue; }
    if (inQuote === '"') { if (ch === '"') inQuote = null; continue; }
    if (ch === '"' || ch === "'") { inQuote = ch; continue; }
    if (ch === '=') return i;
  }
  return -1;
}

function splitPair(word: string): { key: string; value: string } | null {
  const eqIdx = unquotedEquals(word);
  if (eqIdx < 0) return null;
  const key = unquote(word.slice(0, eqIdx));
  if (key === '') throw malformed(`empty key in '${word}'`);
  return { key, value: unquote(word.slice(eqIdx + 1)) };
}

export function parseArgPairs(args: string): ArgPair[] {
  const words = splitWords(args);
  if (words.length === 0) throw malformed('missing argument name');

  return words.map(word => {
    const pair = splitPair(word);
    if (pair) return { name: pair.key, defaultValue: pair.value };
    return { name: unquote(word) };
  });
}

/**
 * ENV and LABEL arguments: `key=value ...`, or the legacy `key value` form
 * where everything after the first word is the value.
 */
export function parseKeyValuePairs(args: string): KeyValuePair[] {
  const trimmed = args.trim();
  const words = splitWords(trimmed);
  if (words.length === 0) throw malformed('missing key-value pairs');

  if (unquotedEquals(words[0]) >= 0) {
    return words.map(word => {
      const pair = splitPair(word);
      if (!pair) throw malformed(`expected key=value, got '${word}'`);
      return pair;
    });
  }

  const key = unquote(words[0]);
  if (key === '') throw malformed(`empty key in '${words[0]}'`);
  const rest = trimmed.slice(words[0].length).trim();
  if (rest === '') throw malformed(`missing value for '${key}'`);
  return [{ key, value: unquote(rest) }];
}
