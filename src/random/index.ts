/**
 * Randomness sources
 *
 * The sharing layers never reach for an ambient generator; every split takes
 * a RandomSource. The default draws from the platform CSPRNG through
 * @noble/hashes. The deterministic sources exist for tests and reproducible
 * vectors and must never protect a real secret.
 */

import { randomBytes } from '@noble/hashes/utils';
import { SskrError } from '../errors.js';

/**
 * Anything that can fill a buffer with random bytes.
 * Implementations must throw rather than leave the buffer untouched.
 */
export interface RandomSource {
  fillRandom(buffer: Uint8Array): void;
}

/**
 * Requests at least this long that come back all-zero are treated as a dead source
 */
const ZERO_FILL_CHECK_LENGTH = 8;

/**
 * Cryptographically secure source backed by crypto.getRandomValues
 */
export const secureRandom: RandomSource = {
  fillRandom(buffer: Uint8Array): void {
    buffer.set(randomBytes(buffer.length));
  },
};

/**
 * Draw `length` bytes from a source.
 *
 * @throws {SskrError} RANDOMNESS_UNAVAILABLE if the source throws or yields only zeros
 */
export function drawRandom(source: RandomSource, length: number): Uint8Array {
  const buffer = new Uint8Array(length);
  if (length === 0) {
    return buffer;
  }

  try {
    source.fillRandom(buffer);
  } catch (err) {
    if (err instanceof SskrError) {
      throw err;
    }
    throw new SskrError(
      `Randomness source failed: ${err instanceof Error ? err.message : String(err)}`,
      'RANDOMNESS_UNAVAILABLE'
    );
  }

  if (length >= ZERO_FILL_CHECK_LENGTH && buffer.every(byte => byte === 0)) {
    throw new SskrError(
      `Randomness source returned ${length} zero bytes`,
      'RANDOMNESS_UNAVAILABLE',
      { length }
    );
  }

  return buffer;
}

/**
 * Deterministic source: every request is filled with 0, 17, 34, ... (mod 256).
 * Matches the fake generator behind the published SSKR test vectors.
 */
export function createFakeRandom(): RandomSource {
  return {
    fillRandom(buffer: Uint8Array): void {
      let value = 0;
      for (let i = 0; i < buffer.length; i++) {
        buffer[i] = value;
        value = (value + 17) & 0xff;
      }
    },
  };
}

/**
 * Source that hands out a fixed byte stream and fails once it runs dry
 */
export function createFixedRandom(bytes: Uint8Array): RandomSource {
  const stream = Uint8Array.from(bytes);
  let offset = 0;

  return {
    fillRandom(buffer: Uint8Array): void {
      if (offset + buffer.length > stream.length) {
        throw new SskrError(
          `Random stream exhausted: needed ${buffer.length} bytes, ${stream.length - offset} left`,
          'RANDOMNESS_UNAVAILABLE',
          { requested: buffer.length, remaining: stream.length - offset }
        );
      }
      buffer.set(stream.subarray(offset, offset + buffer.length));
      offset += buffer.length;
    },
  };
}
