/**
 * Runtime Type Guards
 *
 * Narrowing functions for chain primitives.
 * These enable safe runtime validation at system boundaries
 * (deserialized records, producer input, external integrations).
 */

import type { Address, BlockId, Slot } from "./chain.js";
import { MAX_THREAD } from "./chain.js";

export function isSlot(value: unknown): value is Slot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.period === "number" &&
    Number.isSafeInteger(v.period) &&
    v.period >= 0 &&
    typeof v.thread === "number" &&
    Number.isInteger(v.thread) &&
    v.thread >= 0 &&
    v.thread <= MAX_THREAD
  );
}

export function isBlockId(value: unknown): value is BlockId {
  return typeof value === "string" && value.length > 0;
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.length > 0;
}
