/**
 * Bytewords
 *
 * Maps each byte to one of 256 four-letter words. The first and last letters
 * of every word are unique, so a word can also be written as just those two
 * letters. A big-endian CRC-32 of the payload is appended before mapping.
 *
 * Styles:
 * - standard: `able acid also`
 * - uri:      `able-acid-also`
 * - minimal:  `aeadao`
 */

import { SskrError } from '../errors.js';
import { crc32Bytes } from '../utils/crc32.js';
import { bytesEqual } from '../utils/bytes.js';
import WORDS from './wordlist.json' with { type: 'json' };
import type { BytewordsStyle } from './types.js';

export type { BytewordsStyle } from './types.js';

export const BYTEWORDS_STYLES: readonly BytewordsStyle[] = ['standard', 'uri', 'minimal'];

const CHECKSUM_LENGTH = 4;

const WORD_INDEX = new Map<string, number>();
const MINIMAL_INDEX = new Map<string, number>();

WORDS.forEach((word, index) => {
  WORD_INDEX.set(word, index);
  MINIMAL_INDEX.set(minimalWord(word), index);
});

if (WORD_INDEX.size !== 256 || MINIMAL_INDEX.size !== 256) {
  throw new Error('Bytewords word list must hold 256 words with unique first and last letters');
}

function minimalWord(word: string): string {
  return word[0] + word[word.length - 1];
}

function invalidEncoding(message: string, details?: Record<string, unknown>): SskrError {
  return new SskrError(message, 'INVALID_ENCODING', details);
}

/**
 * Encode bytes as Bytewords, with checksum.
 */
export function encodeBytewords(bytes: Uint8Array, style: BytewordsStyle = 'standard'): string {
  const data = new Uint8Array(bytes.length + CHECKSUM_LENGTH);
  data.set(bytes);
  data.set(crc32Bytes(bytes), bytes.length);

  const words = Array.from(data, byte => WORDS[byte]);

  switch (style) {
    case 'standard':
      return words.join(' ');
    case 'uri':
      return words.join('-');
    case 'minimal':
      return words.map(minimalWord).join('');
  }
}

/**
 * Guess the style of a Bytewords string from its separators
 */
export function detectStyle(text: string): BytewordsStyle {
  const trimmed = text.trim();
  if (/\s/.test(trimmed)) return 'standard';
  if (trimmed.includes('-')) return 'uri';
  return 'minimal';
}

function splitWords(text: string, style: BytewordsStyle): string[] {
  switch (style) {
    case 'standard':
      return text.split(/\s+/);
    case 'uri':
      return text.split('-');
    case 'minimal': {
      if (text.length % 2 !== 0) {
        throw invalidEncoding('Minimal Bytewords must have an even number of letters', {
          length: text.length,
        });
      }
      const pairs: string[] = [];
      for (let i = 0; i < text.length; i += 2) {
        pairs.push(text.slice(i, i + 2));
      }
      return pairs;
    }
  }
}

/**
 * Decode a Bytewords string and verify its checksum.
 *
 * @param style - Expected style; detected from separators when omitted
 * @throws {SskrError} INVALID_ENCODING on an unknown word, a string shorter
 *   than one byte plus checksum, or a checksum mismatch
 */
export function decodeBytewords(text: string, style?: BytewordsStyle): Uint8Array {
  const normalized = text.trim().toLowerCase();
  const resolved = style ?? detectStyle(normalized);
  const index = resolved === 'minimal' ? MINIMAL_INDEX : WORD_INDEX;

  const tokens = normalized.length === 0 ? [] : splitWords(normalized, resolved);
  const data = new Uint8Array(tokens.length);
  tokens.forEach((token, i) => {
    const value = index.get(token);
    if (value === undefined) {
      throw invalidEncoding(`Not a valid byteword: "${token}"`, { position: i });
    }
    data[i] = value;
  });

  if (data.length <= CHECKSUM_LENGTH) {
    throw invalidEncoding('Bytewords string too short (must include checksum)', { words: data.length });
  }

  const payload = data.slice(0, data.length - CHECKSUM_LENGTH);
  const checksum = data.subarray(data.length - CHECKSUM_LENGTH);
  if (!bytesEqual(checksum, crc32Bytes(payload))) {
    throw invalidEncoding('Invalid Bytewords checksum (last 4 words)');
  }

  return payload;
}
