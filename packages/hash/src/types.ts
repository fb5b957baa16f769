/**
 * @scevents/hash — Core types.
 */

/**
 * Size in bytes of every digest.
 */
export const HASH_SIZE_BYTES = 32;

/**
 * A value whose digest is already computed.
 *
 * Containers keyed by a PreHashed value use `preHash()` as the key
 * verbatim instead of hashing the value again.
 */
export interface PreHashed {
  preHash(): Uint8Array;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for digest decoding.
 */
export type HashErrorCode = "INVALID_LENGTH" | "BS58_DECODE";

/**
 * Error thrown when bytes or text do not form a valid digest.
 */
export class HashError extends Error {
  constructor(
    public readonly code: HashErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HashError";
  }
}
