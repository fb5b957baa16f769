/**
 * @scevents/models — Core types.
 */

import { HASH_SIZE_BYTES } from "@scevents/hash";

/**
 * Size in bytes of an event id: the size of its backing digest.
 */
export const EVENT_ID_SIZE_BYTES = HASH_SIZE_BYTES;

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for model construction and decoding.
 *
 * - HASH_ERROR: bytes or text do not decode to a valid digest
 * - INVALID_CONTEXT: execution context fields violate their invariants
 * - INVALID_RECORD: a structured record has the wrong shape
 */
export type ModelsErrorCode = "HASH_ERROR" | "INVALID_CONTEXT" | "INVALID_RECORD";

export class ModelsError extends Error {
  constructor(
    public readonly code: ModelsErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ModelsError";
  }
}
