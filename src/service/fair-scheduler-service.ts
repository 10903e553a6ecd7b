import { join } from "node:path";
import { EventLogger } from "../events/logger.js";
import type { FairSchedulerMetrics } from "../metrics/exporter.js";
import { FairDispatcher } from "../dispatch/fair-dispatcher.js";
import { errorMessage } from "../logging/diagnostics.js";
import type {
  AdmissionDecision,
  Dispatcher,
  NodeSnapshot,
  PeriodicTask,
  TaskSnapshot,
} from "../dispatch/types.js";
import type {
  IBuildQueue,
  IClusterView,
  IHostConfig,
  IRefreshable,
} from "../host/interfaces.js";
import { LatestFigureCache } from "../sla/figure-cache.js";
import type { SlaFigure } from "../sla/figure.js";
import { PoolSlaMonitor, type SlaCycleResult } from "../sla/pool-sla-monitor.js";

export interface FairSchedulerServiceConfig {
  dataDir: string;
  /** Run one sampling cycle as part of start() (default: false). */
  sampleOnStart?: boolean;
}

export interface FairSchedulerServiceDependencies {
  cluster: IClusterView;
  queue: IBuildQueue;
  config: IHostConfig;
  /** Re-read before every sampling cycle, when the host view is not live. */
  source?: IRefreshable;
  logger?: EventLogger;
  metrics?: FairSchedulerMetrics;
  figureCache?: LatestFigureCache;
  dispatcher?: Dispatcher;
  monitor?: PeriodicTask<SlaCycleResult>;
}

export interface FairSchedulerServiceStatus {
  running: boolean;
  sampleIntervalMs: number;
  lastCycleAt?: string;
  lastCycleDurationMs?: number;
  lastError?: string;
  trackedPools: number;
}

/**
 * Host-facing handle: admission decisions, the periodic SLA cycle and the
 * latest figure, wired to one shared cluster view.
 *
 * Sampling cycles are chained on a single promise, so at most one runs at a
 * time and a slow cycle delays the next instead of overlapping it.
 */
export class FairSchedulerService {
  private readonly logger: EventLogger;
  private readonly metrics?: FairSchedulerMetrics;
  private readonly source?: IRefreshable;
  private readonly figureCache: LatestFigureCache;
  private readonly dispatcher: Dispatcher;
  private readonly monitor: PeriodicTask<SlaCycleResult>;
  private readonly sampleOnStart: boolean;

  private running = false;
  private sampleTimer?: NodeJS.Timeout;
  private cycleQueue: Promise<void> = Promise.resolve();
  private lastCycleAt?: string;
  private lastCycleDurationMs?: number;
  private lastError?: string;
  private lastResult?: SlaCycleResult;

  constructor(deps: FairSchedulerServiceDependencies, config: FairSchedulerServiceConfig) {
    this.logger = deps.logger ?? new EventLogger(join(config.dataDir, "events"));
    this.metrics = deps.metrics;
    this.source = deps.source;
    this.figureCache = deps.figureCache ?? new LatestFigureCache();
    this.dispatcher = deps.dispatcher ?? new FairDispatcher(deps.cluster, { metrics: deps.metrics });
    this.monitor = deps.monitor ?? new PoolSlaMonitor({
      cluster: deps.cluster,
      queue: deps.queue,
      config: deps.config,
      figureCache: this.figureCache,
      logger: this.logger,
      metrics: deps.metrics,
    });
    this.sampleOnStart = config.sampleOnStart ?? false;
  }

  get sampleIntervalMs(): number {
    return this.monitor.recurrencePeriodMs;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.metrics?.setUp(true);

    await this.logger.logSystem("system.startup", {
      sampleIntervalMs: this.sampleIntervalMs,
    });

    if (this.sampleOnStart) {
      await this.triggerSample();
    }

    this.sampleTimer = setInterval(() => {
      void this.triggerSample();
    }, this.sampleIntervalMs);
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.sampleTimer) clearInterval(this.sampleTimer);
    this.sampleTimer = undefined;

    await this.cycleQueue;
    this.metrics?.setUp(false);

    try {
      await this.logger.logSystem("system.shutdown", { reason: "stop_signal" });
    } catch (err) {
      console.error(`[FairScheduler] Failed to log shutdown: ${errorMessage(err)}`);
    }
  }

  /** Admission decision for one (node, task) pair. */
  canTake(node: NodeSnapshot, task: TaskSnapshot): AdmissionDecision {
    return this.dispatcher.canTake(node, task);
  }

  /** Latest SLA figure; the placeholder until the first cycle completes. */
  getFigure(): SlaFigure {
    return this.figureCache.getFigure();
  }

  getStatus(): FairSchedulerServiceStatus {
    return {
      running: this.running,
      sampleIntervalMs: this.sampleIntervalMs,
      lastCycleAt: this.lastCycleAt,
      lastCycleDurationMs: this.lastCycleDurationMs,
      lastError: this.lastError,
      trackedPools: this.lastResult?.figure.series.length ?? 0,
    };
  }

  getLastResult(): SlaCycleResult | undefined {
    return this.lastResult;
  }

  /** Queue one sampling cycle behind any cycle already in flight. */
  async triggerSample(): Promise<void> {
    if (!this.running) return;
    this.cycleQueue = this.cycleQueue.then(() => this.runCycle());
    return this.cycleQueue;
  }

  private async runCycle(): Promise<void> {
    const start = performance.now();

    try {
      await this.source?.refresh();
      this.lastResult = await this.monitor.run();
      this.lastCycleAt = new Date().toISOString();
      this.lastError = undefined;
      this.metrics?.observeCycleDuration((performance.now() - start) / 1000);
    } catch (err) {
      const message = errorMessage(err);
      this.lastError = message;
      this.metrics?.recordCycleFailure();
      console.error(`[FairScheduler] SLA cycle failed: ${message}`);
      try {
        await this.logger.log("sla.cycle-failed", "scheduler", {
          payload: { error: message },
        });
      } catch (logErr) {
        console.error(`[FairScheduler] Failed to log cycle failure: ${errorMessage(logErr)}`);
      }
    } finally {
      this.lastCycleDurationMs = Math.round(performance.now() - start);
    }
  }
}
