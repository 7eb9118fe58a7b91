/**
 * sskr-toolkit
 * Sharded Secret Key Reconstruction
 *
 * Splits a 16..32 byte secret (typically BIP-39 seed entropy) across groups
 * of members with two levels of Shamir's Secret Sharing over GF(256):
 * - Any groupThreshold groups recover the secret
 * - Within a group, any memberThreshold members recover that group
 * - A digest checked on recovery rejects wrong or mixed share sets
 */

// =============================================================================
// Main API
// =============================================================================

export { Sskr } from './sskr.js';
export type {
  SplitMnemonicOptions,
  SplitRandomMnemonicOptions,
  RecoverMnemonicOptions,
  MnemonicSplit,
  RecoveredMnemonic,
} from './sskr.js';

// =============================================================================
// Share Hierarchy
// =============================================================================

export { split, recombine, generateShares, combineShares } from './hierarchy/index.js';
export {
  GroupSpecSchema,
  SplitSpecSchema,
  validateSplitSpec,
  createSplitSpec,
} from './hierarchy/spec.js';
export {
  createRecoveryState,
  transitionPhase,
  failRecovery,
  isValidTransition,
  isTerminal,
} from './hierarchy/state-machine.js';
export { RecoveryPhase } from './hierarchy/types.js';
export type {
  GroupSpec,
  SplitSpec,
  RecoveryState,
  PhaseTransition,
  GenerateOptions,
  CombineOptions,
  RecombineOptions,
} from './hierarchy/types.js';

// =============================================================================
// Core Primitives
// =============================================================================

// Shamir Secret Sharing
export {
  ShamirSecretSharing,
  split as shamirSplit,
  combine as shamirCombine,
  interpolate,
  MAX_SHARE_COUNT,
} from './shamir/index.js';
export type { ShareWithIndex, ShamirConfig, SplitResult, ShamirOptions } from './shamir/types.js';

// Digest
export { createDigest, extendSecret, verifyExtendedSecret, DIGEST_LENGTH } from './checksum/index.js';
export type { ExtendedSecret } from './checksum/types.js';

// Randomness
export { secureRandom, drawRandom, createFakeRandom, createFixedRandom } from './random/index.js';
export type { RandomSource } from './random/index.js';

// =============================================================================
// Encoding
// =============================================================================

export { encodeShare, decodeShare, METADATA_LENGTH } from './codec/index.js';
export { wrapShare, unwrapShare, SSKR_SHARE_TAG } from './codec/envelope.js';
export { encodeShareText, decodeShareText } from './codec/text.js';
export type { SskrShare, DecodeOptions } from './codec/types.js';

export { encodeBytewords, decodeBytewords, detectStyle, BYTEWORDS_STYLES } from './bytewords/index.js';
export type { BytewordsStyle } from './bytewords/index.js';

export {
  entropyToMnemonic,
  mnemonicToEntropy,
  generateMnemonic,
  validateMnemonic,
  normalizeMnemonic,
} from './mnemonic/index.js';
export type { MnemonicWordCount } from './mnemonic/index.js';

// =============================================================================
// Configuration, Logging & Errors
// =============================================================================

export { loadConfig, ConfigSchema, LOG_LEVELS } from './config.js';
export type { SskrConfig, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { SskrError, isSskrError } from './errors.js';
export type { SskrErrorCode } from './errors.js';
