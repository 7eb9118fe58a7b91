/**
 * Error taxonomy for splitting and recovery
 *
 * Every failure surfaces as an SskrError carrying a machine-readable code.
 * Nothing here is retried internally; the caller decides whether to ask for
 * more shares or different input.
 */

/**
 * Failure codes
 */
export type SskrErrorCode =
  /** Malformed split spec or wrong secret length */
  | 'INVALID_PARAMETERS'
  /** Not enough qualifying groups or members */
  | 'INSUFFICIENT_SHARES'
  /** Two different values for the same member (or x-coordinate) */
  | 'DUPLICATE_SHARE'
  /** Shares disagree on thresholds, counts or payload length */
  | 'INCONSISTENT_PARAMETERS'
  /** Shares come from more than one split operation */
  | 'MIXED_SHARE_SETS'
  /** Recombined value failed digest verification */
  | 'CHECKSUM_MISMATCH'
  /** Share buffer shorter than header plus minimum payload */
  | 'TRUNCATED_SHARE'
  /** Header fields out of range or reserved bits set */
  | 'MALFORMED_SHARE'
  /** Randomness source failed or produced nothing */
  | 'RANDOMNESS_UNAVAILABLE'
  /** Bytewords or CBOR framing could not be parsed */
  | 'INVALID_ENCODING'
  /** Not a valid BIP-39 phrase */
  | 'INVALID_MNEMONIC'
  /** Recovery asked to skip or revisit a phase */
  | 'INVALID_TRANSITION'
  /** Recovery phase change attempted before its preconditions hold */
  | 'GUARD_FAILED';

/**
 * Error thrown by every splitting, recovery and encoding operation
 */
export class SskrError extends Error {
  constructor(
    message: string,
    public readonly code: SskrErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SskrError';
  }
}

/**
 * Type guard for a specific failure code
 */
export function isSskrError(error: unknown, code?: SskrErrorCode): error is SskrError {
  return error instanceof SskrError && (code === undefined || error.code === code);
}

/**
 * Helper to create an invalid parameters error
 */
export function invalidParameters(message: string, details?: Record<string, unknown>): SskrError {
  return new SskrError(message, 'INVALID_PARAMETERS', details);
}
