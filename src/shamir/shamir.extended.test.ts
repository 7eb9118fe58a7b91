/**
 * Extended Tests for Shamir Secret Sharing
 *
 * Comprehensive test suite covering:
 * - Every threshold subset for small (t,n) combinations
 * - Every secret length
 * - Boundary values for threshold and share count
 * - Tampering with shares
 */

import { describe, it, expect } from 'vitest';
import { bytesToHex } from '@noble/hashes/utils';
import { split, combine, interpolate, DIGEST_INDEX, SECRET_INDEX, MAX_SHARE_COUNT } from './index.js';
import { drawRandom, secureRandom } from '../random/index.js';
import { verifyExtendedSecret } from '../checksum/index.js';
import { SskrError } from '../errors.js';
import type { ShareWithIndex } from './types.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof SskrError ? err.code : 'NOT_SSKR_ERROR';
  }
  return undefined;
}

function subsets<T>(items: T[], k: number): T[][] {
  if (k === 0) return [[]];
  if (items.length < k) return [];
  const [head, ...rest] = items;
  return [...subsets(rest, k - 1).map(tail => [head, ...tail]), ...subsets(rest, k)];
}

describe('Shamir Secret Sharing - Extended Tests', () => {
  // ===========================================================================
  // Property-Based Tests: Various (t,n) Combinations
  // ===========================================================================

  describe('property-based: arbitrary (t,n) combinations', () => {
    for (let n = 2; n <= 6; n++) {
      for (let t = 2; t <= n; t++) {
        it(`should recover from every ${t}-subset of a ${t}-of-${n} split`, () => {
          const secret = drawRandom(secureRandom, 16);
          const { shares } = split(secret, t, n);

          for (const subset of subsets(shares, t)) {
            expect(bytesToHex(combine(subset, t))).toBe(bytesToHex(secret));
          }
        });

        it(`should refuse every ${t - 1}-subset of a ${t}-of-${n} split`, () => {
          const { shares } = split(drawRandom(secureRandom, 16), t, n);

          for (const subset of subsets(shares, t - 1)) {
            expect(codeOf(() => combine(subset, t))).toBe('INSUFFICIENT_SHARES');
          }
        });
      }
    }
  });

  // ===========================================================================
  // Secret Lengths
  // ===========================================================================

  describe('secret lengths', () => {
    for (let length = 16; length <= 32; length += 2) {
      it(`should handle ${length}-byte secrets`, () => {
        const secret = drawRandom(secureRandom, length);
        const { shares } = split(secret, 3, 4);

        expect(shares.every(share => share.y.length === length)).toBe(true);
        expect(bytesToHex(combine([shares[3], shares[0], shares[2]], 3))).toBe(bytesToHex(secret));
      });
    }

    it('should handle all-zero and all-ones secrets', () => {
      for (const fill of [0x00, 0xff]) {
        const secret = new Uint8Array(32).fill(fill);
        const { shares } = split(secret, 2, 2);

        expect(bytesToHex(combine(shares, 2))).toBe(bytesToHex(secret));
      }
    });
  });

  // ===========================================================================
  // Boundaries
  // ===========================================================================

  describe('boundaries', () => {
    it('should support 16-of-16', () => {
      const secret = drawRandom(secureRandom, 32);
      const { shares } = split(secret, MAX_SHARE_COUNT, MAX_SHARE_COUNT);

      expect(bytesToHex(combine([...shares].reverse(), MAX_SHARE_COUNT))).toBe(bytesToHex(secret));
    });

    it('should support 1-of-16', () => {
      const secret = drawRandom(secureRandom, 16);
      const { shares } = split(secret, 1, MAX_SHARE_COUNT);

      expect(bytesToHex(combine([shares[15]], 1))).toBe(bytesToHex(secret));
    });

    it('should interpolate the reserved points from any threshold subset', () => {
      const secret = drawRandom(secureRandom, 16);
      const { shares } = split(secret, 3, 6);
      const points: ShareWithIndex[] = [shares[5], shares[1], shares[4]];

      expect(bytesToHex(interpolate(points, SECRET_INDEX))).toBe(bytesToHex(secret));
      expect(
        verifyExtendedSecret({ secret: interpolate(points, SECRET_INDEX), digestShare: interpolate(points, DIGEST_INDEX) })
      ).toBe(true);
    });

    it('should reject thresholds outside 1..16 on combine', () => {
      const { shares } = split(drawRandom(secureRandom, 16), 2, 3);

      expect(codeOf(() => combine(shares, 0))).toBe('INVALID_PARAMETERS');
      expect(codeOf(() => combine(shares, 17))).toBe('INVALID_PARAMETERS');
    });
  });

  // ===========================================================================
  // Tampering
  // ===========================================================================

  describe('tampering', () => {
    it('should detect a flipped bit in any share position', () => {
      const secret = drawRandom(secureRandom, 16);
      const { shares } = split(secret, 2, 3);
      let detected = 0;

      for (let i = 0; i < 16; i++) {
        const y = Uint8Array.from(shares[1].y);
        y[i] ^= 0x01;
        if (codeOf(() => combine([shares[0], { x: 1, y }], 2)) === 'CHECKSUM_MISMATCH') {
          detected++;
        }
      }

      // A forged digest matches with probability 2^-32 per attempt
      expect(detected).toBe(16);
    });

    it('should detect a share moved to another index', () => {
      const { shares } = split(drawRandom(secureRandom, 16), 2, 3);
      const moved = { x: 2, y: shares[1].y };

      expect(codeOf(() => combine([shares[0], moved], 2))).toBe('CHECKSUM_MISMATCH');
    });
  });
});
