import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, loadConfig } from '../src/engine/config';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockerfile-insight-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): void {
    fs.writeFileSync(path.join(dir, name), content);
  }

  it('returns defaults when no file exists', () => {
    expect(loadConfig(undefined, dir)).toEqual({ format: 'text', indent: 2, color: true });
  });

  it('reads a YAML file from the search paths', () => {
    write('.dockerfile-insightrc.yaml', 'format: json\nindent: 4\n');
    expect(loadConfig(undefined, dir)).toEqual({ format: 'json', indent: 4, color: true });
  });

  it('prefers .yaml over .json', () => {
    write('.dockerfile-insightrc.yaml', 'indent: 1\n');
    write('.dockerfile-insightrc.json', '{"indent": 8}');
    expect(loadConfig(undefined, dir).indent).toBe(1);
  });

  it('reads an explicit JSON file', () => {
    write('custom.json', '{"color": false}');
    expect(loadConfig('custom.json', dir)).toEqual({ format: 'text', indent: 2, color: false });
  });

  it('treats an empty file as defaults', () => {
    write('.dockerfile-insightrc', '');
    expect(loadConfig(undefined, dir)).toEqual({ format: 'text', indent: 2, color: true });
  });

  it('fails on a missing explicit file', () => {
    expect(() => loadConfig('missing.yaml', dir)).toThrow(ConfigError);
    expect(() => loadConfig('missing.yaml', dir)).toThrow('missing.yaml: file not found');
  });

  it('reports files that do not parse', () => {
    write('broken.yaml', 'format: [json\n');
    write('broken.json', '{bad');
    expect(() => loadConfig('broken.yaml', dir)).toThrow(ConfigError);
    expect(() => loadConfig('broken.yaml', dir)).toThrow(/^broken\.yaml: /);
    expect(() => loadConfig('broken.json', dir)).toThrow(ConfigError);
    expect(() => loadConfig('broken.json', dir)).toThrow(/^broken\.json: /);
  });

  it('rejects invalid values', () => {
    write('format.yaml', 'format: xml\n');
    write('indent.yaml', 'indent: -1\n');
    write('color.yaml', 'color: "yes"\n');
    write('list.yaml', '- format\n');
    expect(() => loadConfig('format.yaml', dir)).toThrow("format.yaml: invalid format 'xml'");
    expect(() => loadConfig('indent.yaml', dir)).toThrow('indent.yaml: indent must be a non-negative integer');
    expect(() => loadConfig('color.yaml', dir)).toThrow('color.yaml: color must be true or false');
    expect(() => loadConfig('list.yaml', dir)).toThrow('list.yaml: expected a mapping at the top level');
  });
});
