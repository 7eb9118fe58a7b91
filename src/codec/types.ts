/**
 * Types for the binary share format
 */

/**
 * One member share of a two-level split
 */
export interface SskrShare {
  /** Random 16-bit identifier shared by every share of one split */
  identifier: number;
  /** Number of groups needed to recover the secret */
  groupThreshold: number;
  /** Number of groups in the split */
  groupCount: number;
  /** Group this share belongs to (0-based) */
  groupIndex: number;
  /** Number of members needed to recover this group */
  memberThreshold: number;
  /** Position of this share inside its group (0-based) */
  memberIndex: number;
  /** Share value, same length as the secret */
  value: Uint8Array;
}

/**
 * Options for decoding a share
 */
export interface DecodeOptions {
  /** Reject shares whose reserved bits are set (default: true) */
  strict?: boolean;
}
