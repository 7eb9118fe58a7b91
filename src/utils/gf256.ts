/**
 * GF(2^8) arithmetic for byte-wise secret sharing
 *
 * Field elements are bytes. The field is built from the irreducible
 * polynomial x^8 + x^4 + x^3 + x + 1 (0x11b) with generator 0x03.
 */

/**
 * The reduction polynomial (without the x^8 term after shifting)
 */
export const REDUCING_POLYNOMIAL = 0x11b;

/**
 * Generator of the multiplicative group
 */
export const GENERATOR = 0x03;

/**
 * Antilog table, doubled so a sum of two logs never needs reducing mod 255
 */
const EXP = new Uint8Array(510);

/**
 * Log table; LOG[0] is a placeholder and is always masked out
 */
const LOG = new Uint8Array(256);

{
  let value = 1;
  for (let i = 0; i < 255; i++) {
    EXP[i] = value;
    EXP[i + 255] = value;
    LOG[value] = i;

    // value * 3 = value * 2 + value
    let doubled = value << 1;
    if (doubled & 0x100) {
      doubled ^= REDUCING_POLYNOMIAL;
    }
    value = doubled ^ value;
  }
}

/**
 * Addition (and subtraction): bitwise XOR
 */
export function add(a: number, b: number): number {
  return a ^ b;
}

/**
 * Subtraction is identical to addition in characteristic 2
 */
export const sub = add;

/**
 * Multiplication via log/antilog lookup.
 * A zero operand is handled with a mask rather than a branch on the value.
 */
export function mul(a: number, b: number): number {
  const mask = (-a >> 31) & (-b >> 31);
  return EXP[LOG[a] + LOG[b]] & mask;
}

/**
 * Multiplicative inverse. Zero has none.
 */
export function inv(a: number): number {
  if (a === 0) {
    throw new Error('Zero has no multiplicative inverse in GF(256)');
  }
  return EXP[255 - LOG[a]];
}

/**
 * Division: a * b^(-1)
 */
export function div(a: number, b: number): number {
  return mul(a, inv(b));
}
