/**
 * @scevents/event-store — Core types.
 *
 * Defines the interfaces and types for indexing output events.
 *
 * Design principles:
 * - Stored events are immutable
 * - An event id is stored at most once
 * - (slot, readOnly, indexInSlot) is taken by at most one event
 * - Batches are validated as a whole before anything is stored
 * - Subscriptions enable reactive consumers
 */

import type { EventId, OutputEvent } from "@scevents/models";
import type { Address, Slot } from "@scevents/types";

// =============================================================================
// Filter
// =============================================================================

/**
 * Criteria for selecting output events. All set fields must match.
 */
export interface EventFilter {
  /** First slot included */
  readonly start?: Slot;

  /** First slot excluded */
  readonly end?: Slot;

  /** Innermost address of the call stack */
  readonly emitterAddress?: Address;

  /** Outermost address of the call stack */
  readonly originalCallerAddress?: Address;

  /** Only read-only (true) or only committed (false) events */
  readonly readOnly?: boolean;
}

// =============================================================================
// Append
// =============================================================================

export interface AppendResult {
  /** Number of events appended */
  readonly count: number;

  /** Number of old events dropped to stay within maxEvents */
  readonly pruned: number;

  /** Events held after the append */
  readonly size: number;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for event subscriptions.
 */
export type EventHandler = (event: OutputEvent) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Bounded index of output events.
 *
 * Invariants:
 * - Ids are unique among stored events
 * - Index-in-slot values are unique per (slot, readOnly)
 * - Oldest events are dropped first once maxEvents is exceeded
 * - Subscribers see appended events in order
 */
export interface OutputEventStore {
  /**
   * Append a batch of events, all or nothing.
   *
   * @throws EventStoreError on an empty batch or a duplicate id or slot index
   */
  append(events: readonly OutputEvent[]): AppendResult;

  get(id: EventId): OutputEvent | undefined;

  has(id: EventId): boolean;

  /** All stored events in insertion order. */
  all(): readonly OutputEvent[];

  /** Stored events matching the filter, in insertion order. */
  filter(filter: EventFilter): readonly OutputEvent[];

  /**
   * Handlers are called synchronously after a batch is stored. An error
   * thrown by a handler propagates out of append() and skips the
   * remaining handlers; the batch stays stored.
   */
  subscribe(handler: EventHandler): Subscription;

  readonly size: number;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "EMPTY_APPEND"
  | "DUPLICATE_EVENT_ID"
  | "DUPLICATE_SLOT_INDEX";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly eventId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
