/**
 * One sample of a pool's queue: the wait time summed over every build
 * waiting for the pool at `timestamp`, and how many builds that was.
 */
export interface SlaEntry {
  readonly timestamp: number;
  /** Summed wait of all waiting builds, in ms. */
  readonly totalWaitMs: number;
  readonly waitingBuilds: number;
}

export function createSlaEntry(timestamp: number, totalWaitMs = 0, waitingBuilds = 0): SlaEntry {
  return Object.freeze({ timestamp, totalWaitMs, waitingBuilds });
}

/** Mean wait per waiting build in ms, truncated; 0 when nothing was waiting. */
export function averageWaitMs(entry: SlaEntry): number {
  if (entry.waitingBuilds <= 0) return 0;
  return Math.floor(entry.totalWaitMs / entry.waitingBuilds);
}

export function formatSlaEntry(entry: SlaEntry): string {
  return `${entry.totalWaitMs} ms - ${entry.waitingBuilds} builds`;
}
