/**
 * @scevents/event-store — Event index shared by the store implementations.
 *
 * Holds events in insertion order, plus two lookup structures:
 * - id → event, keyed by the id's digest (PreHashMap)
 * - taken (slot, readOnly, indexInSlot) triples
 */

import { PreHashMap, PreHashSet } from "@scevents/hash";
import type { EventId, EventExecutionContext, OutputEvent } from "@scevents/models";
import { emitterAddress, originalCallerAddress } from "@scevents/models";
import { compareSlots, formatSlot } from "@scevents/types";
import type { EventFilter } from "./types.js";
import { EventStoreError } from "./types.js";

function slotIndexKey(context: EventExecutionContext): string {
  const { period, thread } = context.slot;
  return `${period}:${thread}:${context.readOnly ? "ro" : "c"}:${context.indexInSlot}`;
}

function describeSlotIndex(context: EventExecutionContext): string {
  const domain = context.readOnly ? "read-only" : "committed";
  return `index ${context.indexInSlot} of ${domain} slot ${formatSlot(context.slot)}`;
}

export function matchesFilter(event: OutputEvent, filter: EventFilter): boolean {
  const { context } = event;
  if (filter.start !== undefined && compareSlots(context.slot, filter.start) < 0) {
    return false;
  }
  if (filter.end !== undefined && compareSlots(context.slot, filter.end) >= 0) {
    return false;
  }
  if (filter.readOnly !== undefined && context.readOnly !== filter.readOnly) {
    return false;
  }
  if (
    filter.emitterAddress !== undefined &&
    emitterAddress(context) !== filter.emitterAddress
  ) {
    return false;
  }
  if (
    filter.originalCallerAddress !== undefined &&
    originalCallerAddress(context) !== filter.originalCallerAddress
  ) {
    return false;
  }
  return true;
}

export class EventIndex {
  private readonly _byId = new PreHashMap<EventId, OutputEvent>();
  private readonly _slotIndices = new Set<string>();
  private readonly _log: OutputEvent[] = [];

  get size(): number {
    return this._log.length;
  }

  /**
   * Check a batch against the index and against itself.
   *
   * @throws EventStoreError
   */
  validate(events: readonly OutputEvent[]): void {
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events");
    }

    const batchIds = new PreHashSet<EventId>();
    const batchSlotIndices = new Set<string>();

    for (const event of events) {
      const id = event.id.toBs58Check();
      if (this._byId.has(event.id) || batchIds.has(event.id)) {
        throw new EventStoreError("DUPLICATE_EVENT_ID", `Event ${id} is already stored`, id);
      }
      batchIds.add(event.id);

      const key = slotIndexKey(event.context);
      if (this._slotIndices.has(key) || batchSlotIndices.has(key)) {
        throw new EventStoreError(
          "DUPLICATE_SLOT_INDEX",
          `Event ${id} reuses ${describeSlotIndex(event.context)}`,
          id,
        );
      }
      batchSlotIndices.add(key);
    }
  }

  /** Insert events already checked by {@link EventIndex.validate}. */
  insert(events: readonly OutputEvent[]): void {
    for (const event of events) {
      this._byId.set(event.id, event);
      this._slotIndices.add(slotIndexKey(event.context));
      this._log.push(event);
    }
  }

  /**
   * Drop the oldest events beyond maxEvents.
   *
   * @returns number of events dropped
   */
  prune(maxEvents: number): number {
    const excess = this._log.length - maxEvents;
    if (excess <= 0) {
      return 0;
    }
    for (const event of this._log.splice(0, excess)) {
      this._byId.delete(event.id);
      this._slotIndices.delete(slotIndexKey(event.context));
    }
    return excess;
  }

  get(id: EventId): OutputEvent | undefined {
    return this._byId.get(id);
  }

  has(id: EventId): boolean {
    return this._byId.has(id);
  }

  all(): readonly OutputEvent[] {
    return [...this._log];
  }

  filter(filter: EventFilter): readonly OutputEvent[] {
    return this._log.filter((event) => matchesFilter(event, filter));
  }

  clear(): void {
    this._byId.clear();
    this._slotIndices.clear();
    this._log.length = 0;
  }
}
