import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { analyzeDockerfile } from '../src/engine/analyzer';
import { fromDict, toDict } from '../src/engine/serialize';
import { MULTISTAGE_DOCKERFILE } from './helpers';

describe('toDict', () => {
  it('produces the canonical form of a single-stage analysis', () => {
    expect(toDict(analyzeDockerfile('FROM ubuntu:20.04\nRUN echo hello'))).toEqual({
      num_stages: 1,
      images: [{ full: 'ubuntu:20.04', components: { registry: null, name: 'ubuntu', tag: '20.04', digest: null } }],
      stage_names: [],
      copy_from_stages: [],
      add_from_stages: [],
      multistage_analysis: {
        is_multistage: false,
        stages_used_as_base_images: [],
        stages_copied_from: [],
        stages_added_from: [],
        unused_stages: [],
      },
      exposed_ports: [],
      instructions: { total_count: 2, by_type: [['FROM', 1], ['RUN', 1]] },
      args: [],
      labels: [],
      env_vars: [],
    });
  });

  it('emits keys in a fixed order', () => {
    expect(Object.keys(toDict(analyzeDockerfile('FROM a')))).toEqual([
      'num_stages', 'images', 'stage_names', 'copy_from_stages', 'add_from_stages',
      'multistage_analysis', 'exposed_ports', 'instructions', 'args', 'labels', 'env_vars',
    ]);
  });

  it('uses null for stage bases and bare args', () => {
    const dict = toDict(analyzeDockerfile(MULTISTAGE_DOCKERFILE));
    expect(dict.images[1]).toEqual({ full: 'base', components: null });
    expect(dict.args).toEqual([['GIT_COMMIT', null]]);
    expect(dict.env_vars.map(([key]) => key)).toEqual(['PYTHONPATH', 'PATH', 'GIT_COMMIT']);
  });

  it('keeps first-seen order for integer-like keys', () => {
    const dict = toDict(analyzeDockerfile('ARG Z\nARG 5\nFROM a\nLABEL b=1 10=2'));
    expect(dict.labels).toEqual([['b', '1'], ['10', '2']]);
    expect(dict.args).toEqual([['Z', null], ['5', null]]);
  });
});

describe('fromDict', () => {
  it('reads back what toDict wrote through JSON', () => {
    const analysis = analyzeDockerfile(MULTISTAGE_DOCKERFILE);
    const dict = toDict(analysis);
    const restored = fromDict(JSON.parse(JSON.stringify(dict)));
    expect(toDict(restored)).toEqual(dict);
    expect([...restored.args]).toEqual([['GIT_COMMIT', undefined]]);
    expect(restored.images[1].components).toBeUndefined();
  });

  it('keeps keys that name object internals', () => {
    const analysis = analyzeDockerfile('FROM a\nLABEL __proto__=x y=1');
    const restored = fromDict(JSON.parse(JSON.stringify(toDict(analysis))));
    expect([...restored.labels]).toEqual([['__proto__', 'x'], ['y', '1']]);
  });

  it('rejects duplicate keys', () => {
    const dict = toDict(analyzeDockerfile('FROM a\nLABEL x=1'));
    expect(() => fromDict({ ...dict, labels: [['x', '1'], ['x', '2']] })).toThrow(ZodError);
  });

  it('rejects malformed input', () => {
    expect(() => fromDict({ num_stages: -1 })).toThrow(ZodError);
    expect(() => fromDict('not an analysis')).toThrow(ZodError);
  });
});
