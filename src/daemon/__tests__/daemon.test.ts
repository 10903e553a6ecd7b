import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { existsSync, readFileSync } from "node:fs";
import { startFairSchedulerDaemon, type FairSchedulerDaemonContext } from "../daemon.js";

describe("fair scheduler daemon", () => {
  let tmpDir: string;
  let statePath: string;
  let context: FairSchedulerDaemonContext | undefined;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "fairsched-daemon-test-"));
    statePath = join(tmpDir, "cluster.yaml");
    await writeFile(
      statePath,
      "nodes:\n  - { name: l-0, labels: [linux] }\n  - { name: l-1, labels: [linux] }\n",
      "utf-8",
    );
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(async () => {
    await context?.stop();
    context = undefined;
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("starts the service and samples once", async () => {
    context = await startFairSchedulerDaemon({ dataDir: join(tmpDir, "data"), statePath, enableServer: false });

    const status = context.service.getStatus();
    expect(status.running).toBe(true);
    expect(status.trackedPools).toBe(1);
    expect(context.server).toBeUndefined();
    expect(existsSync(join(tmpDir, "data", "events", "events.jsonl"))).toBe(true);
  });

  it("writes its PID file and refuses a second instance", async () => {
    const dataDir = join(tmpDir, "data");
    context = await startFairSchedulerDaemon({ dataDir, statePath, enableServer: false });

    expect(readFileSync(join(dataDir, "daemon.pid"), "utf-8")).toBe(String(process.pid));
    await expect(startFairSchedulerDaemon({ dataDir, statePath, enableServer: false })).rejects.toThrow(
      `fairsched daemon already running (PID: ${process.pid})`,
    );
  });

  it("releases the PID file and its exit hook on stop", async () => {
    const dataDir = join(tmpDir, "data");
    const exitListeners = process.listenerCount("exit");

    const first = await startFairSchedulerDaemon({ dataDir, statePath, enableServer: false });
    expect(process.listenerCount("exit")).toBe(exitListeners + 1);
    await first.stop();

    expect(existsSync(join(dataDir, "daemon.pid"))).toBe(false);
    expect(process.listenerCount("exit")).toBe(exitListeners);

    context = await startFairSchedulerDaemon({ dataDir, statePath, enableServer: false });
    expect(process.listenerCount("exit")).toBe(exitListeners + 1);
  });

  it("fails to start on an invalid state file", async () => {
    await writeFile(statePath, "nodes: 5\n", "utf-8");
    const exitListeners = process.listenerCount("exit");

    await expect(
      startFairSchedulerDaemon({ dataDir: join(tmpDir, "data"), statePath, enableServer: false }),
    ).rejects.toThrow(/^Invalid /);
    expect(existsSync(join(tmpDir, "data", "daemon.pid"))).toBe(false);
    expect(process.listenerCount("exit")).toBe(exitListeners);
  });
});
