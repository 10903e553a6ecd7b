/**
 * Pool SLA monitor: samples queue wait times per pool on a fixed cadence.
 *
 * Each cycle:
 * 1. sample: sum `now - buildableSince` over the queued buildable items of
 *    every true pool, counting the builds;
 * 2. evaluate: push the sample (or a zero sample) into each pool's bounded
 *    window and compare the average wait with the pool's configured SLA;
 * 3. render: rebuild the figure from the windows and publish it.
 *
 * Windows are created the first time a true pool is seen and then kept
 * for the life of the process, even if the pool is later removed.
 */

import type { EventLogger } from "../events/logger.js";
import type { PoolSamplePayload } from "../schemas/event.js";
import type { IBuildQueue, IClusterView, IHostConfig } from "../host/interfaces.js";
import type { FairSchedulerMetrics } from "../metrics/exporter.js";
import type { PeriodicTask } from "../dispatch/types.js";
import { isTruePool, listTruePools } from "../dispatch/labels.js";
import { createDiagnostics } from "../logging/diagnostics.js";
import {
  MILLISECONDS_IN_MINUTE,
  SLA_ENTRIES_TO_KEEP,
  SLA_SAMPLE_INTERVAL_MS,
  resolveSlaMinutes,
} from "../config/sla-defaults.js";
import { averageWaitMs, createSlaEntry, formatSlaEntry, type SlaEntry } from "./sla-entry.js";
import { BoundedWindow } from "./sla-window.js";
import { renderSlaFigure, type SlaFigure } from "./figure.js";
import type { LatestFigureCache } from "./figure-cache.js";

export interface SlaBreach {
  pool: string;
  observedMinutes: number;
  slaMinutes: number;
  waitingBuilds: number;
}

export interface SlaCycleResult {
  sampledAt: number;
  /** This cycle's aggregate for every pool that had waiting builds. */
  snapshot: ReadonlyMap<string, SlaEntry>;
  breaches: SlaBreach[];
  figure: SlaFigure;
}

export interface PoolSlaMonitorDependencies {
  cluster: IClusterView;
  queue: IBuildQueue;
  config: IHostConfig;
  figureCache: LatestFigureCache;
  logger?: EventLogger;
  metrics?: FairSchedulerMetrics;
  /** Clock override for tests. */
  now?: () => number;
}

export interface PoolSlaMonitorOptions {
  /** Samples retained per pool (default: SLA_ENTRIES_TO_KEEP). */
  windowCapacity?: number;
}

const log = createDiagnostics("PoolSLAMonitor");

/** Stable breach line; downstream log scraping depends on this wording. */
export function formatSlaBreach(breach: SlaBreach): string {
  return (
    `queue wait time (${formatMinutes(breach.observedMinutes)} minutes) ` +
    `for pool '${breach.pool}' exceeded SLA (${breach.slaMinutes} minutes)`
  );
}

function formatMinutes(minutes: number): string {
  return String(Math.round(minutes * 100) / 100);
}

function formatSnapshot(snapshot: ReadonlyMap<string, SlaEntry>): string {
  const parts = [...snapshot].map(([pool, entry]) => `${pool}=${formatSlaEntry(entry)}`);
  return `{${parts.join(", ")}}`;
}

export class PoolSlaMonitor implements PeriodicTask<SlaCycleResult> {
  readonly recurrencePeriodMs = SLA_SAMPLE_INTERVAL_MS;

  private readonly deps: PoolSlaMonitorDependencies;
  private readonly windowCapacity: number;
  private readonly windows = new Map<string, BoundedWindow<SlaEntry>>();

  constructor(deps: PoolSlaMonitorDependencies, options: PoolSlaMonitorOptions = {}) {
    this.deps = deps;
    this.windowCapacity = options.windowCapacity ?? SLA_ENTRIES_TO_KEEP;
  }

  async run(): Promise<SlaCycleResult> {
    const now = this.deps.now?.() ?? Date.now();

    const pools = this.ensureWindows();
    const snapshot = this.sample(now);
    log.info(`current snapshot: ${formatSnapshot(snapshot)}`);

    this.record(pools, snapshot, now);
    const breaches = this.evaluate(snapshot);

    const figure = renderSlaFigure(this.windowSnapshot(), now);
    this.deps.figureCache.publish(figure);

    await this.audit(snapshot, breaches);

    return { sampledAt: now, snapshot, breaches, figure };
  }

  /** Copies of every pool window, oldest sample first. */
  windowSnapshot(): Map<string, SlaEntry[]> {
    const copy = new Map<string, SlaEntry[]>();
    for (const [pool, window] of this.windows) {
      copy.set(pool, window.toArray());
    }
    return copy;
  }

  /** Pools that currently have a window. */
  trackedPools(): string[] {
    return [...this.windows.keys()];
  }

  /** Create a window for every true pool not seen before; returns the host's current labels. */
  private ensureWindows(): readonly string[] {
    const labels = this.deps.cluster.listLabels();
    for (const pool of listTruePools(this.deps.cluster)) {
      if (!this.windows.has(pool)) {
        this.windows.set(pool, new BoundedWindow<SlaEntry>(this.windowCapacity));
      }
    }
    return labels;
  }

  private sample(now: number): Map<string, SlaEntry> {
    const totals = new Map<string, { totalWaitMs: number; waitingBuilds: number }>();

    for (const item of this.deps.queue.buildableItems()) {
      const pool = item.task.label;
      if (pool === undefined) continue;
      if (!isTruePool(pool, this.deps.cluster.labelMembers(pool))) continue;

      const waitMs = Math.max(0, now - item.buildableSince);
      const total = totals.get(pool) ?? { totalWaitMs: 0, waitingBuilds: 0 };
      total.totalWaitMs += waitMs;
      total.waitingBuilds += 1;
      totals.set(pool, total);
    }

    const snapshot = new Map<string, SlaEntry>();
    for (const [pool, total] of totals) {
      snapshot.set(pool, createSlaEntry(now, total.totalWaitMs, total.waitingBuilds));
    }
    return snapshot;
  }

  /** Push one entry per tracked pool that the host still lists; zero when nothing waited. */
  private record(labels: readonly string[], snapshot: ReadonlyMap<string, SlaEntry>, now: number): void {
    for (const label of labels) {
      const window = this.windows.get(label);
      if (!window) continue;

      const entry = snapshot.get(label) ?? createSlaEntry(now);
      window.push(entry);
      this.deps.metrics?.recordPoolSample(
        label,
        averageWaitMs(entry) / MILLISECONDS_IN_MINUTE,
        entry.waitingBuilds,
      );
    }
  }

  private evaluate(snapshot: ReadonlyMap<string, SlaEntry>): SlaBreach[] {
    const env = this.deps.config.globalEnv();
    const breaches: SlaBreach[] = [];

    for (const [pool, entry] of snapshot) {
      const slaMinutes = resolveSlaMinutes(env, pool);
      if (slaMinutes === undefined || entry.waitingBuilds === 0) continue;

      const averageWait = averageWaitMs(entry);
      if (averageWait > slaMinutes * MILLISECONDS_IN_MINUTE) {
        const breach: SlaBreach = {
          pool,
          observedMinutes: averageWait / MILLISECONDS_IN_MINUTE,
          slaMinutes,
          waitingBuilds: entry.waitingBuilds,
        };
        log.severe(formatSlaBreach(breach));
        this.deps.metrics?.recordSlaBreach(pool);
        breaches.push(breach);
      }
    }

    return breaches;
  }

  private async audit(snapshot: ReadonlyMap<string, SlaEntry>, breaches: SlaBreach[]): Promise<void> {
    const logger = this.deps.logger;
    if (!logger) return;

    const pools: Record<string, PoolSamplePayload> = {};
    for (const [pool, entry] of snapshot) {
      pools[pool] = { totalWaitMs: entry.totalWaitMs, waitingBuilds: entry.waitingBuilds };
    }
    await logger.log("sla.sampled", "pool-sla-monitor", { payload: { pools } });

    for (const breach of breaches) {
      await logger.logSlaViolation(
        breach.pool,
        breach.observedMinutes,
        breach.slaMinutes,
        breach.waitingBuilds,
      );
    }
  }
}
