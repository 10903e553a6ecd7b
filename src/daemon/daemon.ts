import { join } from "node:path";
import { existsSync, mkdirSync, readFileSync, writeFileSync, unlinkSync } from "node:fs";
import type { Server } from "node:http";
import { EventLogger } from "../events/logger.js";
import { FileCluster } from "../host/file-cluster.js";
import { FairSchedulerMetrics } from "../metrics/exporter.js";
import { FairSchedulerService } from "../service/fair-scheduler-service.js";
import { createSchedulerServer } from "./server.js";

export interface FairSchedulerDaemonOptions {
  dataDir: string;
  /** Cluster state file, re-read before every sampling cycle. */
  statePath: string;
  port?: number;
  bind?: string;
  enableServer?: boolean;
}

export interface FairSchedulerDaemonContext {
  service: FairSchedulerService;
  cluster: FileCluster;
  server?: Server;
  /** Stop the service, close the server and release the PID file. */
  stop(): Promise<void>;
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks existence
    return true;
  } catch {
    return false;
  }
}

/**
 * Claim the PID file, refusing to start next to a live daemon.
 * Returns the release function, which also runs on process exit.
 */
function acquirePidFile(lockFile: string): () => void {
  if (existsSync(lockFile)) {
    const pid = parseInt(readFileSync(lockFile, "utf-8").trim(), 10);
    if (!isNaN(pid) && isProcessRunning(pid)) {
      throw new Error(`fairsched daemon already running (PID: ${pid})`);
    }
    unlinkSync(lockFile);
  }

  writeFileSync(lockFile, String(process.pid));

  const release = (): void => {
    process.off("exit", release);
    if (existsSync(lockFile)) unlinkSync(lockFile);
  };
  process.on("exit", release);
  return release;
}

export async function startFairSchedulerDaemon(
  opts: FairSchedulerDaemonOptions,
): Promise<FairSchedulerDaemonContext> {
  mkdirSync(opts.dataDir, { recursive: true });
  const releasePidFile = acquirePidFile(join(opts.dataDir, "daemon.pid"));

  let cluster: FileCluster;
  let service: FairSchedulerService;
  let startedAt: number;
  let metrics: FairSchedulerMetrics;
  try {
    cluster = await FileCluster.open(opts.statePath);
    metrics = new FairSchedulerMetrics();
    const logger = new EventLogger(join(opts.dataDir, "events"));

    service = new FairSchedulerService(
      { cluster, queue: cluster, config: cluster, source: cluster, logger, metrics },
      { dataDir: opts.dataDir, sampleOnStart: true },
    );
    startedAt = Date.now();
    await service.start();
  } catch (err) {
    releasePidFile();
    throw err;
  }

  const server: Server | undefined = (opts.enableServer ?? true)
    ? createSchedulerServer(
        { service, startedAt, metrics, cluster },
        opts.port ?? 18000,
        opts.bind ?? "127.0.0.1",
      )
    : undefined;

  const stop = async (): Promise<void> => {
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
    }
    await service.stop();
    releasePidFile();
  };

  return { service, cluster, server, stop };
}
