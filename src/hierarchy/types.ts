/**
 * Types for the two-level share hierarchy
 */

import type { Logger } from 'pino';
import type { DecodeOptions } from '../codec/types.js';
import type { SskrErrorCode } from '../errors.js';
import type { RandomSource } from '../random/index.js';

export type { GroupSpec, SplitSpec } from './spec.js';

/**
 * Phases of a recovery
 *
 * COLLECTING → GROUPS_QUALIFYING → OUTER_READY → VERIFIED
 * Any non-terminal phase may move to FAILED.
 */
export enum RecoveryPhase {
  /** Shares are being partitioned and cross-checked */
  COLLECTING = 'COLLECTING',
  /** Enough groups qualify; group secrets are being recovered */
  GROUPS_QUALIFYING = 'GROUPS_QUALIFYING',
  /** Group threshold reached; outer level can be recombined */
  OUTER_READY = 'OUTER_READY',
  /** Secret recovered and its digest verified */
  VERIFIED = 'VERIFIED',
  /** Recovery stopped on an error */
  FAILED = 'FAILED',
}

/**
 * One recorded phase change. Carries counts only, never share material.
 */
export interface PhaseTransition {
  from: RecoveryPhase;
  to: RecoveryPhase;
  timestamp: Date;
  data: Record<string, unknown>;
}

/**
 * Mutable bookkeeping for a single recovery call
 */
export interface RecoveryState {
  /** Current phase */
  phase: RecoveryPhase;

  /** Groups needed, once known from the shares */
  groupThreshold?: number;

  /** Indexes (0-based) of groups with enough members */
  qualifyingGroups: number[];

  /** Number of group secrets recovered so far */
  recoveredGroups: number;

  /** Phase history */
  transitions: PhaseTransition[];

  /** Error code that moved the state to FAILED, when it was an SskrError */
  failure?: SskrErrorCode;
}

/**
 * Options for creating a recovery state
 */
export interface RecoveryStateOptions {
  /** Called after every phase change */
  onTransition?: (transition: PhaseTransition) => void;
}

/**
 * Options for generating shares
 */
export interface GenerateOptions {
  /** Randomness source (default: secure platform RNG) */
  random?: RandomSource;

  /** Receives debug events (identifiers and counts only) */
  logger?: Logger;
}

/**
 * Options for combining decoded shares
 */
export interface CombineOptions {
  /** Receives debug events (phase changes and counts only) */
  logger?: Logger;
}

/**
 * Options for recombining serialized shares
 */
export interface RecombineOptions extends CombineOptions, DecodeOptions {}
