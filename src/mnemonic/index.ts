/**
 * BIP-39 mnemonics
 *
 * A phrase of 12..24 English words carries 16..32 bytes of entropy, which is
 * exactly the secret that gets split.
 */

import {
  entropyToMnemonic as entropyToMnemonicBase,
  mnemonicToEntropy as mnemonicToEntropyBase,
  validateMnemonic as validateMnemonicBase,
} from '@scure/bip39';
import { wordlist as english } from '@scure/bip39/wordlists/english';
import { SskrError } from '../errors.js';
import { drawRandom, secureRandom, type RandomSource } from '../random/index.js';

/**
 * Phrase lengths offered for new mnemonics
 */
export type MnemonicWordCount = 12 | 24;

const ENTROPY_LENGTH: Record<MnemonicWordCount, number> = {
  12: 16,
  24: 32,
};

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Lowercase a phrase and collapse runs of whitespace
 */
export function normalizeMnemonic(phrase: string): string {
  return phrase.trim().toLowerCase().split(/\s+/).join(' ');
}

export function validateMnemonic(phrase: string): boolean {
  return validateMnemonicBase(normalizeMnemonic(phrase), english);
}

/**
 * Recover the entropy behind a phrase.
 *
 * @throws {SskrError} INVALID_MNEMONIC on an unknown word, wrong length or bad checksum
 */
export function mnemonicToEntropy(phrase: string): Uint8Array {
  try {
    return mnemonicToEntropyBase(normalizeMnemonic(phrase), english);
  } catch (err) {
    throw new SskrError(`Invalid mnemonic: ${reason(err)}`, 'INVALID_MNEMONIC');
  }
}

/**
 * Render entropy as a phrase.
 *
 * @throws {SskrError} INVALID_MNEMONIC if the length is not 16, 20, 24, 28 or 32 bytes
 */
export function entropyToMnemonic(entropy: Uint8Array): string {
  try {
    return entropyToMnemonicBase(entropy, english);
  } catch (err) {
    throw new SskrError(
      `Entropy of ${entropy.length} bytes cannot be made into a mnemonic: ${reason(err)}`,
      'INVALID_MNEMONIC',
      { length: entropy.length }
    );
  }
}

/**
 * Create a new phrase from the given randomness source
 */
export function generateMnemonic(
  words: MnemonicWordCount = 12,
  random: RandomSource = secureRandom
): string {
  return entropyToMnemonic(drawRandom(random, ENTROPY_LENGTH[words]));
}
