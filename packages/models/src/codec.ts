/**
 * @scevents/models — Structured record codec.
 *
 * Storage/transport layout of an output event:
 *
 *   { id, context: { slot, block, read_only, index_in_slot, call_stack }, data }
 *
 * Key order is fixed, an absent block is an explicit null, and the call
 * stack is kept in append order. Records are validated with Zod on the
 * way in.
 */

import { z } from "zod";
import { EventId } from "./event-id.js";
import { createOutputEvent } from "./output-event.js";
import type { OutputEvent } from "./output-event.js";
import { ModelsError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const SlotRecordSchema = z.object({
  period: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  thread: z.number().int().min(0).max(255),
});

export const EventContextRecordSchema = z.object({
  slot: SlotRecordSchema,
  block: z.string().min(1).nullable(),
  read_only: z.boolean(),
  index_in_slot: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  call_stack: z.array(z.string().min(1)),
});

export const OutputEventRecordSchema = z.object({
  id: z.string(),
  context: EventContextRecordSchema,
  data: z.string(),
});

export type EventContextRecord = z.infer<typeof EventContextRecordSchema>;
export type OutputEventRecord = z.infer<typeof OutputEventRecordSchema>;

// =============================================================================
// Encode
// =============================================================================

export function outputEventToRecord(event: OutputEvent): OutputEventRecord {
  const { context } = event;
  return {
    id: event.id.toBs58Check(),
    context: {
      slot: { period: context.slot.period, thread: context.slot.thread },
      block: context.block,
      read_only: context.readOnly,
      index_in_slot: context.indexInSlot,
      call_stack: [...context.callStack],
    },
    data: event.data,
  };
}

export function encodeOutputEvent(event: OutputEvent): string {
  return JSON.stringify(outputEventToRecord(event));
}

// =============================================================================
// Decode
// =============================================================================

/**
 * @throws ModelsError INVALID_RECORD on shape errors, HASH_ERROR on a bad id,
 *   INVALID_CONTEXT when the context breaks its invariants
 */
export function outputEventFromRecord(value: unknown): OutputEvent {
  const parsed = OutputEventRecordSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ModelsError("INVALID_RECORD", `Invalid output event record: ${issues}`, {
      cause: parsed.error,
    });
  }

  const record = parsed.data;
  return createOutputEvent({
    id: EventId.fromBs58Check(record.id),
    context: {
      slot: record.context.slot,
      block: record.context.block,
      readOnly: record.context.read_only,
      indexInSlot: record.context.index_in_slot,
      callStack: record.context.call_stack,
    },
    data: record.data,
  });
}

export function decodeOutputEvent(text: string): OutputEvent {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new ModelsError("INVALID_RECORD", "Output event record is not valid JSON", {
      cause: err,
    });
  }
  return outputEventFromRecord(value);
}
