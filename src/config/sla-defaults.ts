/**
 * Pool SLA configuration: sampling cadence and per-pool thresholds.
 *
 * Thresholds are read from the host's global environment, one key per pool:
 *   poolmonitor.<poolDisplayName>.sla = <minutes>
 * A missing or malformed value means no SLA is configured for that pool.
 */

import { createDiagnostics } from "../logging/diagnostics.js";

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/** Time between two queue samples. Fixed; never computed at runtime. */
export const SLA_SAMPLE_INTERVAL_MS = 30 * MINUTE_MS;

/** How far back the per-pool window reaches. */
export const SLA_RETENTION_MS = 7 * DAY_MS;

/** Samples kept per pool (336 with the defaults above). */
export const SLA_ENTRIES_TO_KEEP = Math.floor(SLA_RETENTION_MS / SLA_SAMPLE_INTERVAL_MS);

export const MILLISECONDS_IN_MINUTE = MINUTE_MS;

const POOLMONITOR_PREFIX = "poolmonitor.";
const POOLMONITOR_POSTFIX = ".sla";

const log = createDiagnostics("PoolSLAMonitor");

/** Name of the global env key holding a pool's SLA. */
export function slaPropertyName(poolDisplayName: string): string {
  return `${POOLMONITOR_PREFIX}${poolDisplayName}${POOLMONITOR_POSTFIX}`;
}

/**
 * Parse an SLA threshold in whole minutes.
 *
 * @returns minutes, or null unless the value is a positive integer
 */
export function parseSlaMinutes(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const minutes = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(minutes) || minutes <= 0) return null;
  return minutes;
}

/**
 * Resolve the configured SLA (minutes) for a pool.
 *
 * @returns minutes, or undefined when no usable SLA is configured
 */
export function resolveSlaMinutes(
  env: Readonly<Record<string, string>> | undefined,
  poolDisplayName: string,
): number | undefined {
  if (!env) return undefined;

  const key = slaPropertyName(poolDisplayName);
  const raw = env[key];
  if (raw === undefined) return undefined;

  const minutes = parseSlaMinutes(raw);
  if (minutes === null) {
    log.fine(`ignoring malformed SLA ${key}=${JSON.stringify(raw)}`);
    return undefined;
  }
  return minutes;
}
