/**
 * @scevents/event-store — In-memory OutputEventStore implementation.
 *
 * Suitable for:
 * - Nodes that only serve recent events over RPC
 * - Unit and integration tests
 *
 * All state is lost on process exit.
 *
 * Properties:
 * - O(1) lookup by id (digest-keyed map)
 * - O(n) filtered reads
 * - Bounded: the oldest events are pruned beyond maxEvents
 * - Synchronous subscription dispatch
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { EventId, OutputEvent } from "@scevents/models";
import { parseEventStoreConfig } from "./config.js";
import type { EventStoreConfig, EventStoreConfigInput } from "./config.js";
import { EventIndex } from "./event-index.js";
import type {
  AppendResult,
  EventFilter,
  EventHandler,
  OutputEventStore,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

export interface OutputEventStoreOptions {
  readonly config?: EventStoreConfigInput;

  /** Defaults to a pino logger at config.logLevel */
  readonly logger?: Logger;
}

export class InMemoryOutputEventStore implements OutputEventStore {
  protected readonly _config: EventStoreConfig;
  protected readonly _logger: Logger;
  protected readonly _index = new EventIndex();

  private readonly _subscribers = new Set<EventHandler>();

  constructor(options: OutputEventStoreOptions = {}) {
    this._config = parseEventStoreConfig(options.config);
    this._logger =
      options.logger ?? pino({ name: "output-event-store", level: this._config.logLevel });
  }

  get config(): EventStoreConfig {
    return this._config;
  }

  get size(): number {
    return this._index.size;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(events: readonly OutputEvent[]): AppendResult {
    try {
      this._index.validate(events);
    } catch (err) {
      if (err instanceof EventStoreError) {
        this._logger.warn(
          { code: err.code, eventId: err.eventId, batchSize: events.length },
          "Rejected output event batch",
        );
      }
      throw err;
    }

    this._persist(events);
    this._index.insert(events);
    const pruned = this._index.prune(this._config.maxEvents);

    this._logger.debug(
      { count: events.length, pruned, size: this._index.size },
      "Appended output events",
    );

    this._dispatch(events);

    return { count: events.length, pruned, size: this._index.size };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  get(id: EventId): OutputEvent | undefined {
    return this._index.get(id);
  }

  has(id: EventId): boolean {
    return this._index.has(id);
  }

  all(): readonly OutputEvent[] {
    return this._index.all();
  }

  filter(filter: EventFilter): readonly OutputEvent[] {
    return this._index.filter(filter);
  }

  clear(): void {
    this._index.clear();
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  /**
   * Handlers run synchronously inside append(), after the batch is stored.
   * A throwing handler stops the dispatch: the error propagates out of
   * append() and later handlers do not see the batch, which stays stored.
   */
  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);

    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Runs after validation and before the index changes. Throwing here
   * leaves the store untouched.
   */
  protected _persist(_events: readonly OutputEvent[]): void {}

  private _dispatch(events: readonly OutputEvent[]): void {
    for (const handler of this._subscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}
