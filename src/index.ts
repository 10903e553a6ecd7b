// Admission
export { FairDispatcher } from "./dispatch/fair-dispatcher.js";
export type { FairDispatcherOptions } from "./dispatch/fair-dispatcher.js";
export { buildUsageHistogram, totalUsage } from "./dispatch/usage-histogram.js";
export type { UsageHistogram } from "./dispatch/usage-histogram.js";
export { findIdleLabeledNodes } from "./dispatch/idle-nodes.js";
export { findLeastUsed } from "./dispatch/least-used.js";
export { isTruePool, hasOnlySelfLabel, listTruePools } from "./dispatch/labels.js";
export type {
  AdmissionDecision,
  AdmissionVerdict,
  BuildRecord,
  DecisionRule,
  Dispatcher,
  NodeSnapshot,
  PeriodicTask,
  TaskSnapshot,
} from "./dispatch/types.js";

// Host
export type {
  IBuildQueue,
  IClusterView,
  IHostConfig,
  IRefreshable,
  ITaskCatalog,
  QueuedBuild,
} from "./host/interfaces.js";
export { ClusterModel } from "./host/cluster-model.js";
export { FileCluster, loadClusterState, parseClusterState } from "./host/file-cluster.js";
export { ClusterState } from "./schemas/cluster.js";

// SLA monitoring
export { PoolSlaMonitor, formatSlaBreach } from "./sla/pool-sla-monitor.js";
export type { SlaBreach, SlaCycleResult } from "./sla/pool-sla-monitor.js";
export { LatestFigureCache } from "./sla/figure-cache.js";
export { EMPTY_SLA_FIGURE, renderSlaFigure } from "./sla/figure.js";
export type { SlaFigure, SlaSeries, SlaPoint } from "./sla/figure.js";
export type { SlaEntry } from "./sla/sla-entry.js";
export { BoundedWindow } from "./sla/sla-window.js";
export {
  SLA_ENTRIES_TO_KEEP,
  SLA_RETENTION_MS,
  SLA_SAMPLE_INTERVAL_MS,
  resolveSlaMinutes,
  slaPropertyName,
} from "./config/sla-defaults.js";

// Service
export { FairSchedulerService } from "./service/fair-scheduler-service.js";
export type { FairSchedulerServiceStatus } from "./service/fair-scheduler-service.js";
export { FairSchedulerMetrics } from "./metrics/exporter.js";
export { EventLogger } from "./events/logger.js";
