/**
 * Test helpers for @scevents/event-store.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import { Hash } from "@scevents/hash";
import { EventId, createOutputEvent } from "@scevents/models";
import type { EventExecutionContext, OutputEvent } from "@scevents/models";

export function makeEvent(
  seed: string,
  overrides: Partial<EventExecutionContext> = {},
): OutputEvent {
  return createOutputEvent({
    id: new EventId(Hash.computeFrom(seed)),
    context: {
      slot: { period: 1, thread: 0 },
      block: "B1block",
      readOnly: false,
      indexInSlot: 0,
      callStack: ["AU1user", "AS1token"],
      ...overrides,
    },
    data: `{"seed":"${seed}"}`,
  });
}

/**
 * Events e0..e{count-1}, one per slot index of the same slot.
 */
export function makeSiblings(count: number, prefix = "e"): OutputEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}${i}`, { indexInSlot: i }));
}

export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

/**
 * A pino logger writing parsed JSON lines into an array.
 */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write: (chunk: string) => {
        lines.push(JSON.parse(chunk) as LogLine);
      },
    },
  );
  return { logger, lines };
}

export const silentLogger: Logger = pino({ level: "silent" });
