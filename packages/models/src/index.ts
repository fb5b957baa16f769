/**
 * @scevents/models — Smart-contract output events.
 *
 * Provides:
 * - EventId: digest-backed identifier with byte and base58check codecs
 * - EventExecutionContext: slot, block, read-only flag, index, call stack
 * - OutputEvent: id + context + opaque data
 * - CallStack: append-only builder used by producers
 * - Record codec for storage and transport
 *
 * @packageDocumentation
 */

// Core types
export type { ModelsErrorCode } from "./types.js";
export { EVENT_ID_SIZE_BYTES, ModelsError } from "./types.js";

// Identity
export { EventId } from "./event-id.js";

// Context
export type { EventExecutionContext } from "./context.js";
export {
  createEventContext,
  emitterAddress,
  originalCallerAddress,
} from "./context.js";
export { CallStack } from "./call-stack.js";

// Aggregate
export type { OutputEvent } from "./output-event.js";
export { createOutputEvent, compareOutputEvents } from "./output-event.js";

// Codec
export type { EventContextRecord, OutputEventRecord } from "./codec.js";
export {
  SlotRecordSchema,
  EventContextRecordSchema,
  OutputEventRecordSchema,
  outputEventToRecord,
  outputEventFromRecord,
  encodeOutputEvent,
  decodeOutputEvent,
} from "./codec.js";
