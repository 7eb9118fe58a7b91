/**
 * Sskr - split and recover BIP-39 mnemonics
 *
 * Ties the pieces together:
 * - Mnemonic: phrase ⇄ entropy
 * - Hierarchy: entropy ⇄ share bytes
 * - Share text: share bytes ⇄ Bytewords lines
 *
 * Only use this on a secure, offline computer.
 */

import { bytesToHex } from '@noble/hashes/utils';
import type { Logger } from 'pino';
import type { BytewordsStyle } from './bytewords/index.js';
import { decodeShareText, encodeShareText } from './codec/text.js';
import { generateShares, recombine } from './hierarchy/index.js';
import type { SplitSpec } from './hierarchy/types.js';
import {
  entropyToMnemonic,
  generateMnemonic,
  mnemonicToEntropy,
  type MnemonicWordCount,
} from './mnemonic/index.js';
import { encodeShare } from './codec/index.js';
import { secureRandom, type RandomSource } from './random/index.js';
import { wipe } from './utils/bytes.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for splitting a phrase
 */
export interface SplitMnemonicOptions {
  /** How share text is written (default: standard) */
  style?: BytewordsStyle;

  /** Randomness source (default: secure platform RNG) */
  random?: RandomSource;

  logger?: Logger;
}

/**
 * Options for splitting a freshly generated phrase
 */
export interface SplitRandomMnemonicOptions extends SplitMnemonicOptions {
  /** Phrase length (default: 12) */
  words?: MnemonicWordCount;
}

/**
 * Options for recovering a phrase
 */
export interface RecoverMnemonicOptions {
  /** Reject shares with reserved header bits set (default: true) */
  strict?: boolean;

  logger?: Logger;
}

/**
 * A split phrase and its shares
 */
export interface MnemonicSplit {
  /** Hex-encoded entropy */
  entropy: string;

  /** Normalized phrase */
  mnemonic: string;

  /** The policy the shares were made with */
  spec: SplitSpec;

  /** Share text, one array per group, members in order */
  groups: string[][];
}

/**
 * A recovered phrase
 */
export interface RecoveredMnemonic {
  /** Hex-encoded entropy */
  entropy: string;

  mnemonic: string;
}

// =============================================================================
// Sskr Class
// =============================================================================

/**
 * Split and recover BIP-39 phrases as Bytewords shares
 *
 * @example
 * ```typescript
 * const spec = createSplitSpec(2, [[2, 3], [3, 5]]);
 * const { mnemonic, groups } = Sskr.splitRandomMnemonic(spec);
 *
 * // any 2 of group 1 and any 3 of group 2
 * const recovered = Sskr.recoverMnemonic([
 *   groups[0][0], groups[0][2],
 *   groups[1][1], groups[1][3], groups[1][4],
 * ]);
 * recovered.mnemonic === mnemonic; // true
 * ```
 */
export class Sskr {
  /**
   * Split an existing phrase
   *
   * @throws {SskrError} INVALID_MNEMONIC, INVALID_PARAMETERS or RANDOMNESS_UNAVAILABLE
   */
  static splitMnemonic(
    phrase: string,
    spec: SplitSpec,
    options: SplitMnemonicOptions = {}
  ): MnemonicSplit {
    const entropy = mnemonicToEntropy(phrase);
    try {
      const shares = generateShares(entropy, spec, { random: options.random, logger: options.logger });
      const style = options.style ?? 'standard';

      return {
        entropy: bytesToHex(entropy),
        mnemonic: entropyToMnemonic(entropy),
        spec,
        groups: shares.map(group => group.map(share => encodeShareText(encodeShare(share), style))),
      };
    } finally {
      wipe(entropy);
    }
  }

  /**
   * Generate a new phrase and split it
   */
  static splitRandomMnemonic(spec: SplitSpec, options: SplitRandomMnemonicOptions = {}): MnemonicSplit {
    const random = options.random ?? secureRandom;
    const phrase = generateMnemonic(options.words ?? 12, random);
    return Sskr.splitMnemonic(phrase, spec, { ...options, random });
  }

  /**
   * Recover a phrase from share text, one share per entry.
   * Blank entries are skipped.
   *
   * @throws {SskrError} INVALID_ENCODING, any recombination error, or
   *   INVALID_MNEMONIC if the secret is not a valid entropy length
   */
  static recoverMnemonic(lines: string[], options: RecoverMnemonicOptions = {}): RecoveredMnemonic {
    const shares = lines
      .filter(line => line.trim().length > 0)
      .map(line => decodeShareText(line));

    const secret = recombine(shares, options);
    try {
      return {
        entropy: bytesToHex(secret),
        mnemonic: entropyToMnemonic(secret),
      };
    } finally {
      wipe(secret);
    }
  }
}
