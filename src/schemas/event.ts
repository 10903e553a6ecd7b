/**
 * Event log schema: JSONL audit stream of the scheduler's periodic work.
 *
 * Every sampling cycle, SLA breach and lifecycle change is recorded as an
 * event. Admission decisions are not: they are synchronous and frequent,
 * and are counted in metrics instead.
 */

import { z } from "zod";

/** Event types: exhaustive list of recorded actions. */
export const EventType = z.enum([
  // System
  "system.startup",
  "system.shutdown",

  // SLA monitoring
  "sla.sampled",
  "sla.violation",
  "sla.cycle-failed",
]);
export type EventType = z.infer<typeof EventType>;

/** Base event structure. */
export const BaseEvent = z.object({
  /** Monotonic event ID (set by event logger). */
  eventId: z.number().int().positive(),
  /** Event type. */
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** Component that recorded the event. */
  actor: z.string(),
  /** Pool the event concerns, if any. */
  pool: z.string().optional(),
  /** Event-specific payload. */
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;

/** SLA violation payload. Field names are relied on by log scrapers. */
export const SlaViolationPayload = z.object({
  pool: z.string(),
  observedMinutes: z.number().nonnegative(),
  slaMinutes: z.number().int().positive(),
  waitingBuilds: z.number().int().positive(),
});
export type SlaViolationPayload = z.infer<typeof SlaViolationPayload>;

/** Per-pool aggregate recorded with every sample. */
export const PoolSamplePayload = z.object({
  totalWaitMs: z.number().nonnegative(),
  waitingBuilds: z.number().int().nonnegative(),
});
export type PoolSamplePayload = z.infer<typeof PoolSamplePayload>;
