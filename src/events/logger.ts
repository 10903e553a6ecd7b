/**
 * Event Logger: append-only JSONL event log.
 *
 * Writes one JSON object per line to events/YYYY-MM-DD.jsonl.
 * Uses the BaseEvent schema from schemas/event.ts.
 */

import { appendFile, mkdir, symlink, unlink } from "node:fs/promises";
import { join } from "node:path";
import type { EventType, BaseEvent, SlaViolationPayload } from "../schemas/event.js";
import { errorMessage } from "../logging/diagnostics.js";

export type EventCallback = (event: BaseEvent) => void | Promise<void>;

export interface EventLoggerOptions {
  onEvent?: EventCallback;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class EventLogger {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private eventCounter: number = 0;

  constructor(eventsDir: string, options?: EventLoggerOptions) {
    this.eventsDir = eventsDir;
    this.onEvent = options?.onEvent;
  }

  /** Append an event to today's JSONL file. */
  async log(
    type: EventType,
    actor: string,
    opts?: {
      pool?: string;
      payload?: Record<string, unknown>;
    },
  ): Promise<BaseEvent> {
    this.eventCounter += 1;

    const event: BaseEvent = {
      eventId: this.eventCounter,
      type,
      timestamp: new Date().toISOString(),
      actor,
      pool: opts?.pool,
      payload: opts?.payload ?? {},
    };

    const date = event.timestamp.slice(0, 10); // YYYY-MM-DD
    const filePath = join(this.eventsDir, `${date}.jsonl`);

    await mkdir(this.eventsDir, { recursive: true });
    const line = JSON.stringify(event) + "\n";
    await appendFile(filePath, line, "utf-8");

    await this.updateSymlink(date);

    if (this.onEvent) {
      await Promise.resolve(this.onEvent(event));
    }

    return event;
  }

  /** Point events.jsonl at the current day's log. */
  private async updateSymlink(date: string): Promise<void> {
    const symlinkPath = join(this.eventsDir, "events.jsonl");
    const targetFilename = `${date}.jsonl`;

    try {
      await unlink(symlinkPath);
    } catch (err) {
      if (!isMissingFile(err)) {
        console.warn(`[EventLogger] Failed to remove symlink: ${errorMessage(err)}`);
      }
    }

    try {
      // Relative target so the events directory can be moved as a whole
      await symlink(targetFilename, symlinkPath);
    } catch (err) {
      console.warn(`[EventLogger] Failed to update symlink: ${errorMessage(err)}`);
    }
  }

  /** Log a system lifecycle event. */
  async logSystem(
    type: "system.startup" | "system.shutdown",
    payload?: Record<string, unknown>,
  ): Promise<void> {
    await this.log(type, "system", { payload });
  }

  /** Log an SLA breach for a pool. */
  async logSlaViolation(
    pool: string,
    observedMinutes: number,
    slaMinutes: number,
    waitingBuilds: number,
  ): Promise<void> {
    const payload: SlaViolationPayload = { pool, observedMinutes, slaMinutes, waitingBuilds };
    await this.log("sla.violation", "pool-sla-monitor", { pool, payload });
  }
}
