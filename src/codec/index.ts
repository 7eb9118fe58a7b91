/**
 * Binary share format
 *
 * Every share is a 5-byte header followed by the share value:
 *
 *   byte 0-1  identifier (big-endian)
 *   byte 2    groupThreshold - 1 | groupCount - 1
 *   byte 3    groupIndex         | memberThreshold - 1
 *   byte 4    reserved (0)       | memberIndex
 *   byte 5..  value (16..32 bytes)
 *
 * Each header byte holds two 4-bit fields, high nibble first.
 */

import { SskrError } from '../errors.js';
import { MIN_SECRET_LENGTH, isValidSecretLength } from '../utils/bytes.js';
import type { DecodeOptions, SskrShare } from './types.js';

/**
 * Header length in bytes
 */
export const METADATA_LENGTH = 5;

function isNibble(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0x0f;
}

/**
 * Serialize a share.
 *
 * @throws {SskrError} INVALID_PARAMETERS if a field does not fit its slot
 */
export function encodeShare(share: SskrShare): Uint8Array {
  const fields: Record<string, number> = {
    groupThreshold: share.groupThreshold - 1,
    groupCount: share.groupCount - 1,
    groupIndex: share.groupIndex,
    memberThreshold: share.memberThreshold - 1,
    memberIndex: share.memberIndex,
  };

  for (const [name, value] of Object.entries(fields)) {
    if (!isNibble(value)) {
      throw new SskrError(`Share field ${name} out of range`, 'INVALID_PARAMETERS', { [name]: value });
    }
  }

  if (!Number.isInteger(share.identifier) || share.identifier < 0 || share.identifier > 0xffff) {
    throw new SskrError('Share identifier must be a 16-bit value', 'INVALID_PARAMETERS', {
      identifier: share.identifier,
    });
  }

  if (!isValidSecretLength(share.value.length)) {
    throw new SskrError('Share value must be an even number of bytes between 16 and 32', 'INVALID_PARAMETERS', {
      length: share.value.length,
    });
  }

  const result = new Uint8Array(METADATA_LENGTH + share.value.length);
  result[0] = share.identifier >> 8;
  result[1] = share.identifier & 0xff;
  result[2] = ((share.groupThreshold - 1) << 4) | (share.groupCount - 1);
  result[3] = (share.groupIndex << 4) | (share.memberThreshold - 1);
  result[4] = share.memberIndex;
  result.set(share.value, METADATA_LENGTH);

  return result;
}

/**
 * Parse a serialized share.
 *
 * @throws {SskrError} TRUNCATED_SHARE if the buffer is too short,
 *   MALFORMED_SHARE if a header field or the value length is invalid
 */
export function decodeShare(bytes: Uint8Array, options: DecodeOptions = {}): SskrShare {
  const strict = options.strict ?? true;

  if (bytes.length < METADATA_LENGTH + MIN_SECRET_LENGTH) {
    throw new SskrError(
      `Share is too short: ${bytes.length} bytes, need at least ${METADATA_LENGTH + MIN_SECRET_LENGTH}`,
      'TRUNCATED_SHARE',
      { length: bytes.length }
    );
  }

  const groupThreshold = (bytes[2] >> 4) + 1;
  const groupCount = (bytes[2] & 0x0f) + 1;
  if (groupThreshold > groupCount) {
    throw new SskrError(
      `Share has invalid group threshold ${groupThreshold} for ${groupCount} groups`,
      'MALFORMED_SHARE',
      { groupThreshold, groupCount }
    );
  }

  const groupIndex = bytes[3] >> 4;
  if (groupIndex >= groupCount) {
    throw new SskrError(
      `Share has group index ${groupIndex} but only ${groupCount} groups`,
      'MALFORMED_SHARE',
      { groupIndex, groupCount }
    );
  }

  const reserved = bytes[4] >> 4;
  if (strict && reserved !== 0) {
    throw new SskrError('Share has invalid reserved bits', 'MALFORMED_SHARE', { reserved });
  }

  const value = bytes.slice(METADATA_LENGTH);
  if (!isValidSecretLength(value.length)) {
    throw new SskrError(`Share value has invalid length ${value.length}`, 'MALFORMED_SHARE', {
      length: value.length,
    });
  }

  return {
    identifier: (bytes[0] << 8) | bytes[1],
    groupThreshold,
    groupCount,
    groupIndex,
    memberThreshold: (bytes[3] & 0x0f) + 1,
    memberIndex: bytes[4] & 0x0f,
    value,
  };
}
