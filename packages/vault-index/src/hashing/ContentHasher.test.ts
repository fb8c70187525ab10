import { describe, it, expect } from 'vitest';
import { ContentHasher, hashContent } from './ContentHasher.js';

describe('ContentHasher', () => {
  const hasher = new ContentHasher();

  it('should produce the SHA-256 hex digest', () => {
    expect(hasher.hash('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
    expect(hasher.hash('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });

  it('should hash strings and their UTF-8 bytes identically', () => {
    const text = '# Café notes\n';
    expect(hasher.hash(text)).toBe(hasher.hash(Buffer.from(text, 'utf8')));
  });

  it('should be deterministic across instances', () => {
    expect(hashContent('same')).toBe(new ContentHasher().hash('same'));
    expect(hashContent('same')).not.toBe(hashContent('same '));
  });
});
