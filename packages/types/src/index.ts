/**
 * @scevents/types — Shared chain primitives.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation of identifiers — meaning lives in consuming code
 */

// Chain types
export type { Slot, BlockId, Address } from "./chain.js";
export { MAX_THREAD, compareSlots, slotsEqual, formatSlot } from "./chain.js";

// Runtime type guards
export { isSlot, isBlockId, isAddress } from "./guards.js";
