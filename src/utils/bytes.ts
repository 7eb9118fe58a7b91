/**
 * Byte buffer helpers shared by the sharing layers
 */

/** Smallest secret accepted, in bytes */
export const MIN_SECRET_LENGTH = 16;

/** Largest secret accepted, in bytes */
export const MAX_SECRET_LENGTH = 32;

/**
 * Check that a secret (or share payload) length is 16..32 and even
 */
export function isValidSecretLength(length: number): boolean {
  return (
    Number.isInteger(length) &&
    length >= MIN_SECRET_LENGTH &&
    length <= MAX_SECRET_LENGTH &&
    length % 2 === 0
  );
}

/**
 * Overwrite buffers with zeros
 */
export function wipe(...buffers: Uint8Array[]): void {
  for (const buffer of buffers) {
    buffer.fill(0);
  }
}

/**
 * Compare two buffers without an early exit on the first difference
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * Plain equality, for non-secret comparisons such as deduplication
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((byte, i) => byte === b[i]);
}
