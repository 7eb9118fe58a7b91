/**
 * Types for Shamir Secret Sharing over GF(256)
 */

import type { RandomSource } from '../random/index.js';

/**
 * A secret share with its index (x-coordinate)
 */
export interface ShareWithIndex {
  /** The x-coordinate (share index, 0-based) */
  x: number;
  /** The y-values, one field element per secret byte */
  y: Uint8Array;
}

/**
 * Configuration for Shamir Secret Sharing
 */
export interface ShamirConfig {
  /** Minimum number of shares required for reconstruction (threshold) */
  threshold: number;
  /** Total number of shares to generate */
  totalShares: number;
}

/**
 * Result of splitting a secret
 */
export interface SplitResult {
  /** The generated shares with their indices */
  shares: ShareWithIndex[];
  /** The threshold required for reconstruction */
  threshold: number;
}

/**
 * Options for the ShamirSecretSharing class
 */
export interface ShamirOptions {
  /** Source of coefficients and salts (default: secure platform RNG) */
  random?: RandomSource;
}
