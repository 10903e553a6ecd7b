/**
 * Prometheus metrics for the fair scheduler, using prom-client.
 *
 * Metrics:
 * - fairsched_admission_decisions_total{rule,verdict}   counter
 * - fairsched_pool_wait_minutes{pool}                   gauge
 * - fairsched_pool_waiting_builds{pool}                 gauge
 * - fairsched_sla_breaches_total{pool}                  counter
 * - fairsched_sla_cycle_duration_seconds                histogram
 * - fairsched_sla_cycle_failures_total                  counter
 * - fairsched_up                                        gauge
 */

import {
  Registry,
  Gauge,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { DecisionRule } from "../dispatch/types.js";

export interface FairSchedulerMetricsOptions {
  /** Also collect Node.js process metrics (GC, event loop, ...). Default: true. */
  collectDefaults?: boolean;
}

export class FairSchedulerMetrics {
  readonly registry: Registry;

  readonly admissionDecisions: Counter;
  readonly poolWaitMinutes: Gauge;
  readonly poolWaitingBuilds: Gauge;
  readonly slaBreaches: Counter;
  readonly slaCycleDuration: Histogram;
  readonly slaCycleFailures: Counter;
  readonly up: Gauge;

  constructor(options: FairSchedulerMetricsOptions = {}) {
    this.registry = new Registry();

    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry, prefix: "fairsched_" });
    }

    this.admissionDecisions = new Counter({
      name: "fairsched_admission_decisions_total",
      help: "Admission decisions by deciding rule and verdict",
      labelNames: ["rule", "verdict"] as const,
      registers: [this.registry],
    });

    this.poolWaitMinutes = new Gauge({
      name: "fairsched_pool_wait_minutes",
      help: "Average queue wait of the latest sample, per pool",
      labelNames: ["pool"] as const,
      registers: [this.registry],
    });

    this.poolWaitingBuilds = new Gauge({
      name: "fairsched_pool_waiting_builds",
      help: "Builds waiting for the pool at the latest sample",
      labelNames: ["pool"] as const,
      registers: [this.registry],
    });

    this.slaBreaches = new Counter({
      name: "fairsched_sla_breaches_total",
      help: "Samples whose average wait exceeded the pool SLA",
      labelNames: ["pool"] as const,
      registers: [this.registry],
    });

    this.slaCycleDuration = new Histogram({
      name: "fairsched_sla_cycle_duration_seconds",
      help: "Duration of one SLA sampling cycle",
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1.0, 5.0],
      registers: [this.registry],
    });

    this.slaCycleFailures = new Counter({
      name: "fairsched_sla_cycle_failures_total",
      help: "SLA sampling cycles that failed",
      registers: [this.registry],
    });

    this.up = new Gauge({
      name: "fairsched_up",
      help: "Scheduler service status (1=up, 0=down)",
      registers: [this.registry],
    });
  }

  recordDecision(rule: DecisionRule, allowed: boolean): void {
    this.admissionDecisions.labels({ rule, verdict: allowed ? "allow" : "block" }).inc();
  }

  /** Record the latest sample of a pool. */
  recordPoolSample(pool: string, averageMinutes: number, waitingBuilds: number): void {
    this.poolWaitMinutes.labels({ pool }).set(averageMinutes);
    this.poolWaitingBuilds.labels({ pool }).set(waitingBuilds);
  }

  recordSlaBreach(pool: string): void {
    this.slaBreaches.labels({ pool }).inc();
  }

  observeCycleDuration(durationSeconds: number): void {
    this.slaCycleDuration.observe(durationSeconds);
  }

  recordCycleFailure(): void {
    this.slaCycleFailures.inc();
  }

  setUp(up: boolean): void {
    this.up.set(up ? 1 : 0);
  }

  /** Get metrics in Prometheus text format. */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
