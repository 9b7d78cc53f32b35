/**
 * Tests for SHA-256 helpers.
 */
import { describe, it, expect } from 'vitest';
import { sha256Hex, verifyDigest } from '../../../src/utils/checksum.js';

const EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const ABC = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('sha256Hex', () => {
  it('should hash strings and bytes alike', () => {
    expect(sha256Hex('')).toBe(EMPTY);
    expect(sha256Hex('abc')).toBe(ABC);
    expect(sha256Hex(Buffer.from('abc'))).toBe(ABC);
  });
});

describe('verifyDigest', () => {
  it('should accept uppercase stored digests', () => {
    expect(verifyDigest('abc', ABC.toUpperCase())).toBe(true);
    expect(verifyDigest('abd', ABC)).toBe(false);
  });
});
