/**
 * How Bytewords are written out
 *
 * - standard: full words separated by spaces
 * - uri: full words separated by hyphens
 * - minimal: first and last letter of each word, no separator
 */
export type BytewordsStyle = 'standard' | 'uri' | 'minimal';
