/**
 * Text form of a share: Bytewords over the CBOR-framed share bytes
 */

import { decodeBytewords, encodeBytewords, type BytewordsStyle } from '../bytewords/index.js';
import { unwrapShare, wrapShare } from './envelope.js';

/**
 * Render serialized share bytes as text
 */
export function encodeShareText(share: Uint8Array, style: BytewordsStyle = 'standard'): string {
  return encodeBytewords(wrapShare(share), style);
}

/**
 * Parse share text back into serialized share bytes.
 * The Bytewords style is detected unless given.
 *
 * @throws {SskrError} INVALID_ENCODING
 */
export function decodeShareText(text: string, style?: BytewordsStyle): Uint8Array {
  return unwrapShare(decodeBytewords(text, style));
}
