/**
 * Test helpers for @scevents/models.
 */

import { Hash } from "@scevents/hash";
import { EventId } from "../src/event-id.js";
import type { EventExecutionContext } from "../src/context.js";

export function makeId(seed: string): EventId {
  return new EventId(Hash.computeFrom(seed));
}

export function makeContext(
  overrides: Partial<EventExecutionContext> = {},
): EventExecutionContext {
  return {
    slot: { period: 10, thread: 2 },
    block: "B1block",
    readOnly: false,
    indexInSlot: 0,
    callStack: ["AU1user", "AS1token"],
    ...overrides,
  };
}
