import { describe, it, expect } from 'vitest';
import { parseImageReference } from '../src/parser/image';
import { DockerfileError } from '../src/parser/errors';

function imageError(text: string): DockerfileError {
  try {
    parseImageReference(text);
  } catch (err) {
    if (err instanceof DockerfileError) return err;
    throw err;
  }
  throw new Error(`expected '${text}' to be rejected`);
}

describe('parseImageReference', () => {
  it('splits name and tag', () => {
    expect(parseImageReference('ubuntu:20.04')).toEqual({ registry: undefined, name: 'ubuntu', tag: '20.04', digest: undefined });
  });

  it('treats an untagged name as implicit latest', () => {
    expect(parseImageReference('scratch')).toEqual({ name: 'scratch' });
  });

  it('does not mistake a namespace for a registry', () => {
    expect(parseImageReference('library/ubuntu')).toEqual({ name: 'library/ubuntu' });
  });

  it('detects a registry by its dot', () => {
    expect(parseImageReference('myregistry.com/ubuntu')).toEqual({ registry: 'myregistry.com', name: 'ubuntu' });
  });

  it('detects localhost as a registry', () => {
    expect(parseImageReference('localhost/app')).toEqual({ registry: 'localhost', name: 'app' });
  });

  it('keeps a registry port apart from the tag', () => {
    expect(parseImageReference('localhost:5000/team/app:1.2')).toEqual({
      registry: 'localhost:5000', name: 'team/app', tag: '1.2',
    });
  });

  it('parses a digest', () => {
    expect(parseImageReference('registry.example.com/base-images/python@sha256:abc123')).toEqual({
      registry: 'registry.example.com', name: 'base-images/python', digest: 'sha256:abc123',
    });
  });

  it('leaves build-arg placeholders untouched', () => {
    expect(parseImageReference('${REGISTRY}/app:${TAG:-latest}')).toEqual({ name: '${REGISTRY}/app', tag: '${TAG:-latest}' });
    expect(parseImageReference('$BASE_IMAGE')).toEqual({ name: '$BASE_IMAGE' });
    expect(parseImageReference('${BASE:-ubuntu}')).toEqual({ name: '${BASE:-ubuntu}' });
  });

  it('rejects a tag together with a digest', () => {
    const err = imageError('python:3.13@sha256:abc');
    expect(err.kind).toBe('InvalidImageReference');
    expect(err.reason).toBe("invalid image reference 'python:3.13@sha256:abc': both a tag and a digest");
  });

  it('rejects two digests', () => {
    expect(imageError('a@b@c').reason).toBe("invalid image reference 'a@b@c': more than one '@'");
  });

  it('rejects empty parts', () => {
    expect(imageError('').reason).toBe("invalid image reference '': empty reference");
    expect(imageError('ubuntu:').reason).toBe("invalid image reference 'ubuntu:': empty tag");
    expect(imageError('ubuntu@').reason).toBe("invalid image reference 'ubuntu@': empty digest");
    expect(imageError(':1.0').reason).toBe("invalid image reference ':1.0': empty name");
    expect(imageError('a//b').reason).toBe("invalid image reference 'a//b': empty path component");
  });
});
