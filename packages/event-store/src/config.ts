/**
 * @scevents/event-store — Configuration.
 *
 * Validates store options with Zod and fills in defaults.
 */

import { z } from "zod";

export const EventStoreConfigSchema = z.object({
  /** Events kept before the oldest are pruned */
  maxEvents: z.number().int().min(1).default(10_000),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type EventStoreConfig = z.infer<typeof EventStoreConfigSchema>;
export type EventStoreConfigInput = z.input<typeof EventStoreConfigSchema>;

/**
 * @throws {z.ZodError} if an option is out of range
 */
export function parseEventStoreConfig(input: EventStoreConfigInput = {}): EventStoreConfig {
  return EventStoreConfigSchema.parse(input);
}
