/**
 * Chain Types
 *
 * Positional and identity primitives of the execution timeline.
 *
 * Rules:
 * - Slots are ordered by period first, then thread
 * - Block and address identifiers are opaque text
 * - No execution capability in these types
 */

/**
 * Largest thread index a slot can carry (threads are a single byte).
 */
export const MAX_THREAD = 255;

/**
 * Position in the execution/consensus timeline.
 */
export interface Slot {
  /** Period number (non-negative integer) */
  readonly period: number;

  /** Thread within the period (0..=MAX_THREAD) */
  readonly thread: number;
}

/**
 * Identifier of a block produced at some slot.
 */
export type BlockId = string;

/**
 * Address of an account or smart contract.
 */
export type Address = string;

/**
 * Total order over slots: by period, then by thread.
 */
export function compareSlots(a: Slot, b: Slot): -1 | 0 | 1 {
  if (a.period !== b.period) {
    return a.period < b.period ? -1 : 1;
  }
  if (a.thread !== b.thread) {
    return a.thread < b.thread ? -1 : 1;
  }
  return 0;
}

export function slotsEqual(a: Slot, b: Slot): boolean {
  return a.period === b.period && a.thread === b.thread;
}

/**
 * Human-readable rendering, e.g. `(period: 12, thread: 3)`.
 */
export function formatSlot(slot: Slot): string {
  return `(period: ${slot.period}, thread: ${slot.thread})`;
}
