/**
 * Secret digest for Shamir share sets
 *
 * A polynomial with threshold > 1 is anchored by two points: the secret
 * itself and a "digest share" holding
 *
 *   HMAC-SHA256(key = salt, message = secret)[0..4] || salt
 *
 * where salt is (secret length - 4) random bytes. After interpolation both
 * points are recovered and the digest is recomputed; a mismatch means the
 * shares do not belong together or one of them was altered.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { drawRandom, type RandomSource } from '../random/index.js';
import { constantTimeEqual, wipe } from '../utils/bytes.js';
import type { ExtendedSecret } from './types.js';

/**
 * Length of the truncated digest, in bytes
 */
export const DIGEST_LENGTH = 4;

/**
 * Compute the 4-byte digest of a secret under a salt
 */
export function createDigest(salt: Uint8Array, secret: Uint8Array): Uint8Array {
  const mac = hmac(sha256, salt, secret);
  const digest = mac.slice(0, DIGEST_LENGTH);
  wipe(mac);
  return digest;
}

/**
 * Build the digest share for a secret: digest || salt, same length as the secret.
 * The salt buffer is zeroed once copied in.
 */
export function extendSecret(secret: Uint8Array, random: RandomSource): ExtendedSecret {
  const salt = drawRandom(random, secret.length - DIGEST_LENGTH);
  const digestShare = new Uint8Array(secret.length);
  digestShare.set(createDigest(salt, secret), 0);
  digestShare.set(salt, DIGEST_LENGTH);
  wipe(salt);

  return { secret, digestShare };
}

/**
 * Recompute the digest from a recovered secret and salt and compare it with
 * the recovered digest bytes
 */
export function verifyExtendedSecret({ secret, digestShare }: ExtendedSecret): boolean {
  if (digestShare.length !== secret.length || secret.length <= DIGEST_LENGTH) {
    return false;
  }

  const expected = createDigest(digestShare.subarray(DIGEST_LENGTH), secret);
  return constantTimeEqual(expected, digestShare.subarray(0, DIGEST_LENGTH));
}
