/**
 * @scevents/models — Output event aggregate.
 *
 * By-product of a smart-contract execution: an id, the context the
 * execution engine attached to it, and free-form data (conventionally
 * JSON text, never parsed here).
 *
 * The id is expected to be a deterministic function of
 * (slot, readOnly, indexInSlot); producing it uniquely is the execution
 * engine's responsibility.
 */

import { compareSlots } from "@scevents/types";
import { EventId } from "./event-id.js";
import { createEventContext } from "./context.js";
import type { EventExecutionContext } from "./context.js";
import { ModelsError } from "./types.js";

export interface OutputEvent {
  readonly id: EventId;
  readonly context: EventExecutionContext;
  readonly data: string;
}

/**
 * Validate an (id, context, data) triple and build a frozen event.
 *
 * @throws ModelsError INVALID_CONTEXT or INVALID_RECORD
 */
export function createOutputEvent(input: OutputEvent): OutputEvent {
  if (!(input.id instanceof EventId)) {
    throw new ModelsError("INVALID_RECORD", "Output event id must be an EventId");
  }
  if (typeof input.data !== "string") {
    throw new ModelsError("INVALID_RECORD", "Output event data must be a string");
  }
  return Object.freeze({
    id: input.id,
    context: createEventContext(input.context),
    data: input.data,
  });
}

/**
 * Execution order: by slot, committed events before read-only ones,
 * then by index in slot.
 */
export function compareOutputEvents(a: OutputEvent, b: OutputEvent): number {
  const bySlot = compareSlots(a.context.slot, b.context.slot);
  if (bySlot !== 0) {
    return bySlot;
  }
  if (a.context.readOnly !== b.context.readOnly) {
    return a.context.readOnly ? 1 : -1;
  }
  return a.context.indexInSlot - b.context.indexInSlot;
}
