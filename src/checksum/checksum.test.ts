/**
 * Tests for the secret digest
 */

import { describe, it, expect } from 'vitest';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { createDigest, extendSecret, verifyExtendedSecret, DIGEST_LENGTH } from './index.js';
import { createFakeRandom, createFixedRandom } from '../random/index.js';
import { SskrError } from '../errors.js';

const SECRET = hexToBytes('000102030405060708090a0b0c0d0e0f');

describe('Secret digest', () => {
  describe('createDigest', () => {
    it('should truncate HMAC-SHA256(salt, secret) to 4 bytes', () => {
      expect(bytesToHex(createDigest(new Uint8Array(12), new Uint8Array(16)))).toBe('853c7403');
    });

    it('should depend on the salt', () => {
      const a = createDigest(new Uint8Array(12), SECRET);
      const b = createDigest(new Uint8Array(12).fill(1), SECRET);

      expect(bytesToHex(a)).not.toBe(bytesToHex(b));
    });
  });

  describe('extendSecret', () => {
    it('should lay out digest || salt with the secret length', () => {
      const { secret, digestShare } = extendSecret(SECRET, createFakeRandom());

      expect(secret).toBe(SECRET);
      expect(digestShare).toHaveLength(16);
      expect(bytesToHex(digestShare)).toBe('1c11f49c00112233445566778899aabb');
    });

    it('should draw secret length - 4 bytes of salt', () => {
      const random = createFixedRandom(new Uint8Array(28).fill(9));
      const { digestShare } = extendSecret(new Uint8Array(32), random);

      expect(Array.from(digestShare.subarray(DIGEST_LENGTH))).toEqual(new Array(28).fill(9));
    });

    it('should fail when the randomness source runs dry', () => {
      const random = createFixedRandom(new Uint8Array(11).fill(1));

      expect(() => extendSecret(SECRET, random)).toThrow(SskrError);
    });
  });

  describe('verifyExtendedSecret', () => {
    it('should accept an untouched extended secret', () => {
      expect(verifyExtendedSecret(extendSecret(SECRET, createFakeRandom()))).toBe(true);
    });

    it('should reject a modified secret', () => {
      const { digestShare } = extendSecret(SECRET, createFakeRandom());
      const altered = Uint8Array.from(SECRET);
      altered[15] ^= 0x80;

      expect(verifyExtendedSecret({ secret: altered, digestShare })).toBe(false);
    });

    it('should reject a modified salt', () => {
      const { digestShare } = extendSecret(SECRET, createFakeRandom());
      digestShare[10] ^= 0x01;

      expect(verifyExtendedSecret({ secret: SECRET, digestShare })).toBe(false);
    });

    it('should reject mismatched lengths', () => {
      const { digestShare } = extendSecret(SECRET, createFakeRandom());

      expect(verifyExtendedSecret({ secret: new Uint8Array(18), digestShare })).toBe(false);
    });
  });
});
