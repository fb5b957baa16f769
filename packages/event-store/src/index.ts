/**
 * @scevents/event-store — Output event indexing.
 *
 * Provides:
 * - OutputEventStore interface with id lookup and filtered reads
 * - InMemoryOutputEventStore, bounded by maxEvents
 * - JsonlOutputEventStore for file-backed persistence
 * - Zod-validated store configuration
 *
 * @packageDocumentation
 */

// Core types
export type {
  EventFilter,
  AppendResult,
  EventHandler,
  Subscription,
  OutputEventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Configuration
export type { EventStoreConfig, EventStoreConfigInput } from "./config.js";
export { EventStoreConfigSchema, parseEventStoreConfig } from "./config.js";

// Filtering
export { matchesFilter } from "./event-index.js";

// Implementations
export { InMemoryOutputEventStore } from "./in-memory-store.js";
export type { OutputEventStoreOptions } from "./in-memory-store.js";
export { JsonlOutputEventStore } from "./jsonl-store.js";
export type { JsonlOutputEventStoreOptions } from "./jsonl-store.js";
