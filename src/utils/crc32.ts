/**
 * CRC-32 (ISO-HDLC): reflected polynomial 0xEDB88320, init and final XOR 0xFFFFFFFF.
 * This is the checksum used by zlib, PNG and Bytewords.
 */

const TABLE = new Uint32Array(256);

for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  TABLE[n] = c >>> 0;
}

/**
 * Compute the CRC-32 of a buffer as an unsigned 32-bit integer
 */
export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * CRC-32 as four big-endian bytes
 */
export function crc32Bytes(bytes: Uint8Array): Uint8Array {
  const value = crc32(bytes);
  return Uint8Array.of(value >>> 24, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff);
}
