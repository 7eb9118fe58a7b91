/**
 * Types for the secret digest
 */

/**
 * A secret together with its digest share.
 * Both buffers have the same length.
 */
export interface ExtendedSecret {
  /** The secret (interpolated at x = 255) */
  secret: Uint8Array;
  /** digest || salt (interpolated at x = 254) */
  digestShare: Uint8Array;
}
