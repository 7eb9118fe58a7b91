/**
 * Shamir Secret Sharing over GF(256)
 *
 * Implements (t, n) threshold sharing of a byte buffer where:
 * - Each byte position is an independent polynomial over GF(256)
 * - Any t shares reconstruct the buffer
 * - Fewer than t shares reveal nothing about it
 *
 * For t > 1 the polynomial is pinned by t - 2 random shares plus two reserved
 * points: the digest share at x = 254 and the secret at x = 255. Shares are
 * handed out at x = 0, 1, ..., n - 1, so the reserved points are never
 * distributed, and recovery interpolates both of them and checks the digest.
 */

import { extendSecret, verifyExtendedSecret } from '../checksum/index.js';
import { SskrError, invalidParameters } from '../errors.js';
import { drawRandom, secureRandom, type RandomSource } from '../random/index.js';
import { bytesEqual, isValidSecretLength, wipe } from '../utils/bytes.js';
import { add, div, mul, sub } from '../utils/gf256.js';
import type { ShamirConfig, ShamirOptions, ShareWithIndex, SplitResult } from './types.js';

/**
 * Maximum number of shares at one level
 */
export const MAX_SHARE_COUNT = 16;

/**
 * Reserved x-coordinate of the secret
 */
export const SECRET_INDEX = 255;

/**
 * Reserved x-coordinate of the digest share
 */
export const DIGEST_INDEX = 254;

/**
 * Validate threshold, share count and secret length.
 *
 * @throws {SskrError} INVALID_PARAMETERS
 */
export function validateParameters(threshold: number, totalShares: number, secretLength: number): void {
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw invalidParameters('Threshold must be at least 1', { threshold });
  }

  if (!Number.isInteger(totalShares) || totalShares > MAX_SHARE_COUNT) {
    throw invalidParameters(`Total shares must be at most ${MAX_SHARE_COUNT}`, { totalShares });
  }

  if (totalShares < threshold) {
    throw invalidParameters(`Total shares (${totalShares}) must be >= threshold (${threshold})`, {
      threshold,
      totalShares,
    });
  }

  if (!isValidSecretLength(secretLength)) {
    throw invalidParameters('Secret length must be an even number of bytes between 16 and 32', {
      secretLength,
    });
  }
}

/**
 * Evaluate, at x, the polynomial passing through the given points.
 *
 * Uses the Lagrange form:
 * f(x) = Σ y_i * L_i(x)
 * where L_i(x) = Π (x - x_j) / (x_i - x_j) for j ≠ i
 *
 * @param points - Points with pairwise distinct x-coordinates and equal-length y
 * @param x - The point at which to evaluate
 * @returns One field element per byte position
 */
export function interpolate(points: ShareWithIndex[], x: number): Uint8Array {
  if (points.length === 0) {
    throw new Error('At least one point is required');
  }

  const length = points[0].y.length;
  const result = new Uint8Array(length);

  for (let i = 0; i < points.length; i++) {
    const { x: xi, y: yi } = points[i];

    let basis = 1;
    for (let j = 0; j < points.length; j++) {
      if (i === j) continue;
      const xj = points[j].x;
      basis = mul(basis, div(sub(x, xj), sub(xi, xj)));
    }

    for (let k = 0; k < length; k++) {
      result[k] = add(result[k], mul(basis, yi[k]));
    }
  }

  return result;
}

/**
 * Split a secret into shares.
 *
 * Creates n shares where any t shares can reconstruct the secret.
 * Shares are indexed from 0 to n - 1.
 *
 * @param secret - The secret (16..32 bytes, even length)
 * @param threshold - Minimum number of shares needed to reconstruct (t)
 * @param totalShares - Total number of shares to create (n)
 * @param random - Randomness source for coefficients and the digest salt
 */
export function split(
  secret: Uint8Array,
  threshold: number,
  totalShares: number,
  random: RandomSource = secureRandom
): SplitResult {
  validateParameters(threshold, totalShares, secret.length);

  if (threshold === 1) {
    const shares: ShareWithIndex[] = [];
    for (let i = 0; i < totalShares; i++) {
      shares.push({ x: i, y: Uint8Array.from(secret) });
    }
    return { shares, threshold };
  }

  const shares: ShareWithIndex[] = new Array(totalShares);
  const points: ShareWithIndex[] = [];

  // t - 2 shares are pure randomness
  for (let i = 0; i < threshold - 2; i++) {
    const share = { x: i, y: drawRandom(random, secret.length) };
    shares[i] = share;
    points.push(share);
  }

  const { digestShare } = extendSecret(secret, random);
  points.push({ x: DIGEST_INDEX, y: digestShare });
  points.push({ x: SECRET_INDEX, y: secret });

  try {
    for (let i = threshold - 2; i < totalShares; i++) {
      shares[i] = { x: i, y: interpolate(points, i) };
    }
  } finally {
    wipe(digestShare);
  }

  return { shares, threshold };
}

/**
 * Keep one share per x-coordinate.
 *
 * @throws {SskrError} DUPLICATE_SHARE if two shares share an x but differ in value
 */
function distinctShares(shares: ShareWithIndex[]): ShareWithIndex[] {
  const byIndex = new Map<number, ShareWithIndex>();

  for (const share of shares) {
    const existing = byIndex.get(share.x);
    if (existing === undefined) {
      byIndex.set(share.x, share);
    } else if (!bytesEqual(existing.y, share.y)) {
      throw new SskrError(`Conflicting values for share index ${share.x}`, 'DUPLICATE_SHARE', {
        index: share.x,
      });
    }
  }

  return [...byIndex.values()];
}

/**
 * Reconstruct a secret from shares.
 *
 * Uses the first `threshold` distinct shares. For t > 1 the digest share and
 * the secret are both interpolated and the digest is verified.
 *
 * @param shares - At least `threshold` shares with distinct x-coordinates
 * @param threshold - The threshold the shares were created with
 * @returns The reconstructed secret
 * @throws {SskrError} INSUFFICIENT_SHARES, DUPLICATE_SHARE, INCONSISTENT_PARAMETERS,
 *   INVALID_PARAMETERS or CHECKSUM_MISMATCH
 */
export function combine(shares: ShareWithIndex[], threshold: number): Uint8Array {
  if (!Number.isInteger(threshold) || threshold < 1 || threshold > MAX_SHARE_COUNT) {
    throw invalidParameters(`Threshold must be between 1 and ${MAX_SHARE_COUNT}`, { threshold });
  }

  for (let i = 0; i < shares.length; i++) {
    const { x } = shares[i];
    if (!Number.isInteger(x) || x < 0 || x >= MAX_SHARE_COUNT) {
      throw invalidParameters(`Share ${i} has invalid x-coordinate ${x}`, { x });
    }
  }

  const distinct = distinctShares(shares);
  if (distinct.length < threshold) {
    throw new SskrError(
      `Need ${threshold} shares but only ${distinct.length} distinct shares were supplied`,
      'INSUFFICIENT_SHARES',
      { threshold, supplied: distinct.length }
    );
  }

  const length = distinct[0].y.length;
  if (distinct.some(share => share.y.length !== length)) {
    throw new SskrError('Shares have unequal lengths', 'INCONSISTENT_PARAMETERS');
  }
  if (!isValidSecretLength(length)) {
    throw invalidParameters('Share length must be an even number of bytes between 16 and 32', {
      length,
    });
  }

  if (threshold === 1) {
    return Uint8Array.from(distinct[0].y);
  }

  const points = distinct.slice(0, threshold);
  const digestShare = interpolate(points, DIGEST_INDEX);
  const secret = interpolate(points, SECRET_INDEX);

  try {
    if (!verifyExtendedSecret({ secret, digestShare })) {
      wipe(secret);
      throw new SskrError('Recovered secret failed digest verification', 'CHECKSUM_MISMATCH');
    }
  } finally {
    wipe(digestShare);
  }

  return secret;
}

/**
 * Shamir Secret Sharing class with convenient API
 */
export class ShamirSecretSharing {
  private readonly random: RandomSource;

  constructor(options?: ShamirOptions) {
    this.random = options?.random ?? secureRandom;
  }

  /**
   * Split a secret into shares
   */
  split(secret: Uint8Array, config: ShamirConfig): SplitResult {
    return split(secret, config.threshold, config.totalShares, this.random);
  }

  /**
   * Combine shares to reconstruct the secret
   */
  combine(shares: ShareWithIndex[], threshold: number): Uint8Array {
    return combine(shares, threshold);
  }
}
