import type { FairSchedulerServiceStatus } from "../service/fair-scheduler-service.js";

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  uptime: number;
  lastCycleAt: string | null;
  lastError: string | null;
  trackedPools: number;
}

export interface DaemonState {
  startedAt: number;
  service: FairSchedulerServiceStatus;
}

/** A cycle is overdue once two sampling intervals pass without one. */
const STALE_INTERVALS = 2;

export function getHealthStatus(state: DaemonState, now: number = Date.now()): HealthStatus {
  const { service } = state;
  const lastActivity = service.lastCycleAt ? new Date(service.lastCycleAt).getTime() : state.startedAt;
  const isStale = now - lastActivity > STALE_INTERVALS * service.sampleIntervalMs;

  const healthy = service.running && !isStale && service.lastError === undefined;

  return {
    status: healthy ? "healthy" : "unhealthy",
    uptime: now - state.startedAt,
    lastCycleAt: service.lastCycleAt ?? null,
    lastError: service.lastError ?? null,
    trackedPools: service.trackedPools,
  };
}
