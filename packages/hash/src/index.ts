/**
 * @scevents/hash — Digest primitive.
 *
 * Provides:
 * - Hash: fixed-size SHA-256 digest with raw and base58check codecs
 * - PreHashed: values carrying their own digest
 * - PreHashMap / PreHashSet: containers keyed by that digest
 *
 * @packageDocumentation
 */

export type { PreHashed, HashErrorCode } from "./types.js";
export { HASH_SIZE_BYTES, HashError } from "./types.js";

export { Hash } from "./hash.js";

export { PreHashMap, PreHashSet } from "./prehash.js";
