/**
 * CBOR framing for share bytes
 *
 * A serialized share travels as CBOR tag 309 wrapping a byte string. Only the
 * canonical (shortest) encoding is produced and accepted:
 *
 *   d9 01 35        tag(309)
 *   40+n | 58 n     bytes(n), n < 24 | n < 256
 *   ...             share
 */

import { SskrError } from '../errors.js';

/** Registered CBOR tag for SSKR shares */
export const SSKR_SHARE_TAG = 309;

const TAG_HEADER = Uint8Array.of(0xd9, SSKR_SHARE_TAG >> 8, SSKR_SHARE_TAG & 0xff);
const BYTE_STRING = 0x40;
const BYTE_STRING_UINT8 = 0x58;

function byteStringHeader(length: number): Uint8Array {
  return length < 24 ? Uint8Array.of(BYTE_STRING | length) : Uint8Array.of(BYTE_STRING_UINT8, length);
}

/**
 * Wrap share bytes in tag 309.
 *
 * @throws {SskrError} INVALID_PARAMETERS if the share is 256 bytes or longer
 */
export function wrapShare(share: Uint8Array): Uint8Array {
  if (share.length > 0xff) {
    throw new SskrError('Share too long for CBOR framing', 'INVALID_PARAMETERS', { length: share.length });
  }

  const header = byteStringHeader(share.length);
  const result = new Uint8Array(TAG_HEADER.length + header.length + share.length);
  result.set(TAG_HEADER);
  result.set(header, TAG_HEADER.length);
  result.set(share, TAG_HEADER.length + header.length);
  return result;
}

/**
 * Unwrap share bytes from tag 309.
 *
 * @throws {SskrError} INVALID_ENCODING on a different tag, a non-canonical
 *   length, or trailing or missing bytes
 */
export function unwrapShare(data: Uint8Array): Uint8Array {
  if (data.length < TAG_HEADER.length + 1 || !TAG_HEADER.every((byte, i) => data[i] === byte)) {
    throw new SskrError(`Expected CBOR tag ${SSKR_SHARE_TAG}`, 'INVALID_ENCODING');
  }

  const initial = data[TAG_HEADER.length];
  let offset = TAG_HEADER.length + 1;
  let length: number;

  if ((initial & 0xe0) === BYTE_STRING && (initial & 0x1f) < 24) {
    length = initial & 0x1f;
  } else if (initial === BYTE_STRING_UINT8 && data.length > offset) {
    length = data[offset];
    offset += 1;
    if (length < 24) {
      throw new SskrError('Non-canonical CBOR byte string length', 'INVALID_ENCODING', { length });
    }
  } else {
    throw new SskrError('Expected a CBOR byte string inside the share tag', 'INVALID_ENCODING', {
      initialByte: initial,
    });
  }

  if (data.length !== offset + length) {
    throw new SskrError('CBOR byte string length does not match the data', 'INVALID_ENCODING', {
      declared: length,
      available: data.length - offset,
    });
  }

  return data.slice(offset);
}
