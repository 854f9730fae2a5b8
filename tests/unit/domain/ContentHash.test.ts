import { describe, it, expect } from 'vitest';
import { ContentHash } from '../../../src/domain/value-objects/ContentHash.js';

describe('ContentHash', () => {
  it('should produce the SHA-256 hex digest of the bytes', () => {
    expect(ContentHash.fromBytes(Buffer.from('hello world', 'utf-8')).value)
      .toBe('b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9');
    expect(ContentHash.fromBytes(new Uint8Array()).value)
      .toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('should produce different hash for different input', () => {
    const h1 = ContentHash.fromBytes(Buffer.from('hello'));
    const h2 = ContentHash.fromBytes(Buffer.from('world'));
    expect(h1.value).not.toBe(h2.value);
  });
});
