import { DockerfileError } from './errors';
import { ImageComponents } from './types';

function invalid(text: string, detail: string): DockerfileError {
  return new DockerfileError('InvalidImageReference', `invalid image reference '${text}': ${detail}`);
}

/**
 * Positions of `ch` outside `${...}` placeholders, so `${TAG:-latest}` or
 * `${REGISTRY}/app` keep their inner separators.
 */
function positionsOutsideVars(text: string, ch: string): number[] {
  const positions: number[] = [];
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '$' && text[i + 1] === '{') {
      depth++;
      i++;
      continue;
    }
    if (depth > 0) {
      if (text[i] === '}') depth--;
      continue;
    }
    if (text[i] === ch) positions.push(i);
  }
  return positions;
}

function looksLikeRegistry(component: string): boolean {
  if (component === 'localhost') return true;
  return positionsOutsideVars(component, '.').length > 0 || positionsOutsideVars(component, ':').length > 0;
}

/**
 * Decompose `[registry/]name[:tag|@digest]`. Placeholders are kept as
 * literal text; nothing is substituted.
 */
export function parseImageReference(text: string): ImageComponents {
  if (text === '') throw invalid(text, 'empty reference');
  if (/\s/.test(text)) throw invalid(text, 'contains whitespace');

  const ats = positionsOutsideVars(text, '@');
  if (ats.length > 1) throw invalid(text, "more than one '@'");

  let remainder = text;
  let digest: string | undefined;
  if (ats.length === 1) {
    digest = text.slice(ats[0] + 1);
    remainder = text.slice(0, ats[0]);
    if (digest === '') throw invalid(text, 'empty digest');
  }

  let registry: string | undefined;
  const slashes = positionsOutsideVars(remainder, '/');
  if (slashes.length > 0) {
    const first = remainder.slice(0, slashes[0]);
    if (looksLikeRegistry(first)) {
      registry = first;
      remainder = remainder.slice(slashes[0] + 1);
    }
  }

  const lastSlash = positionsOutsideVars(remainder, '/').pop() ?? -1;
  const colon = positionsOutsideVars(remainder, ':').find(pos => pos > lastSlash);
  let name = remainder;
  let tag: string | undefined;
  if (colon !== undefined) {
    name = remainder.slice(0, colon);
    tag = remainder.slice(colon + 1);
    if (tag === '') throw invalid(text, 'empty tag');
  }

  if (name === '') throw invalid(text, 'empty name');
  if (name.startsWith('/') || name.endsWith('/') || name.includes('//')) {
    throw invalid(text, 'empty path component');
  }
  if (tag !== undefined && digest !== undefined) {
    throw invalid(text, 'both a tag and a digest');
  }

  return { registry, name, tag, digest };
}
