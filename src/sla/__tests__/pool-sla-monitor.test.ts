import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { InMemoryCluster } from "../../testing/in-memory-cluster.js";
import { EventLogger } from "../../events/logger.js";
import { FairSchedulerMetrics } from "../../metrics/exporter.js";
import { createSlaEntry } from "../sla-entry.js";
import { LatestFigureCache } from "../figure-cache.js";
import { PoolSlaMonitor, formatSlaBreach, type PoolSlaMonitorDependencies } from "../pool-sla-monitor.js";

const MINUTE = 60_000;
const START = 1_767_225_600_000; // 2026-01-01T00:00:00Z

describe("PoolSlaMonitor", () => {
  let cluster: InMemoryCluster;
  let figureCache: LatestFigureCache;
  let now: number;

  beforeEach(() => {
    now = START;
    figureCache = new LatestFigureCache();
    cluster = new InMemoryCluster()
      .addNodes("l", 2, { labels: ["linux"] })
      .addNode({ name: "g-0", labels: ["gpu"] })
      .addNode({ name: "solo" })
      .addJob({ name: "build", label: "linux" })
      .addJob({ name: "render", label: "gpu" })
      .addJob({ name: "misc" })
      .addJob({ name: "pinned", label: "solo" });
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createMonitor(extra: Partial<PoolSlaMonitorDependencies> = {}, windowCapacity?: number): PoolSlaMonitor {
    return new PoolSlaMonitor(
      { cluster, queue: cluster, config: cluster, figureCache, now: () => now, ...extra },
      { windowCapacity },
    );
  }

  describe("sampling", () => {
    it("sums the waits of queued builds per true pool", async () => {
      cluster
        .enqueue("build", now - MINUTE)
        .enqueue("build", now - 2 * MINUTE)
        .enqueue("render", now - 30_000)
        .enqueue("misc", now - 999)
        .enqueue("pinned", now - 5);

      const result = await createMonitor().run();

      expect(result.sampledAt).toBe(START);
      expect(result.snapshot).toEqual(new Map([
        ["linux", createSlaEntry(START, 3 * MINUTE, 2)],
        ["gpu", createSlaEntry(START, 30_000, 1)],
      ]));
      expect(result.breaches).toEqual([]);
    });

    it("logs the snapshot", async () => {
      cluster.enqueue("build", now - MINUTE);

      await createMonitor().run();

      expect(console.info).toHaveBeenCalledWith(
        "[PoolSLAMonitor] current snapshot: {linux=60000 ms - 1 builds}",
      );
    });

    it("counts builds that became buildable after the sample time as zero wait", async () => {
      cluster.enqueue("build", now + 5_000);

      const result = await createMonitor().run();

      expect(result.snapshot.get("linux")).toEqual(createSlaEntry(START, 0, 1));
    });
  });

  describe("windows", () => {
    it("records a zero sample for pools with nothing waiting", async () => {
      const monitor = createMonitor();

      const result = await monitor.run();

      expect(result.snapshot.size).toBe(0);
      expect(monitor.windowSnapshot()).toEqual(new Map([
        ["linux", [createSlaEntry(START)]],
        ["gpu", [createSlaEntry(START)]],
      ]));
    });

    it("does not track self-labels", async () => {
      const monitor = createMonitor();
      await monitor.run();

      expect(monitor.trackedPools()).toEqual(["linux", "gpu"]);
    });

    it("keeps only the newest samples", async () => {
      const monitor = createMonitor({}, 3);

      for (let i = 0; i < 5; i++) {
        await monitor.run();
        now += 30 * MINUTE;
      }

      const timestamps = monitor.windowSnapshot().get("linux")?.map((e) => e.timestamp);
      expect(timestamps).toEqual([START + 60 * MINUTE, START + 90 * MINUTE, START + 120 * MINUTE]);
    });

    it("starts tracking a pool that appears later", async () => {
      const monitor = createMonitor();
      await monitor.run();

      cluster.addNode({ name: "a-0", labels: ["arm"] });
      now += 30 * MINUTE;
      await monitor.run();

      const windows = monitor.windowSnapshot();
      expect(windows.get("linux")).toHaveLength(2);
      expect(windows.get("arm")).toEqual([createSlaEntry(START + 30 * MINUTE)]);
    });

    it("keeps the window of a removed pool without adding samples", async () => {
      const monitor = createMonitor();
      await monitor.run();

      cluster.removeNode("g-0");
      now += 30 * MINUTE;
      const result = await monitor.run();

      expect(monitor.trackedPools()).toEqual(["linux", "gpu"]);
      expect(monitor.windowSnapshot().get("gpu")).toEqual([createSlaEntry(START)]);
      expect(result.figure.series.map((s) => s.pool)).toEqual(["linux", "gpu"]);
    });
  });

  describe("SLA evaluation", () => {
    beforeEach(() => {
      vi.spyOn(console, "error").mockImplementation(() => {});
    });

    it("reports a pool whose average wait exceeds its SLA", async () => {
      cluster
        .setEnv({ "poolmonitor.linux.sla": "1" })
        .enqueue("build", now - 3 * MINUTE)
        .enqueue("build", now - MINUTE);

      const result = await createMonitor().run();

      expect(result.breaches).toEqual([
        { pool: "linux", observedMinutes: 2, slaMinutes: 1, waitingBuilds: 2 },
      ]);
      expect(console.error).toHaveBeenCalledWith(
        "[PoolSLAMonitor] queue wait time (2 minutes) for pool 'linux' exceeded SLA (1 minutes)",
      );
    });

    it("does not report a wait equal to the SLA", async () => {
      cluster.setEnv({ "poolmonitor.linux.sla": "1" }).enqueue("build", now - MINUTE);

      const result = await createMonitor().run();

      expect(result.breaches).toEqual([]);
    });

    it("skips pools with a malformed or missing SLA", async () => {
      cluster
        .setEnv({ "poolmonitor.linux.sla": "abc" })
        .enqueue("build", now - 60 * MINUTE)
        .enqueue("render", now - 60 * MINUTE);

      const result = await createMonitor().run();

      expect(result.breaches).toEqual([]);
      expect(console.error).not.toHaveBeenCalled();
    });

    it("skips evaluation when the host has no environment", async () => {
      cluster.setEnv(undefined).enqueue("build", now - 60 * MINUTE);

      const result = await createMonitor().run();

      expect(result.breaches).toEqual([]);
    });

    it("formats fractional minutes to two decimals", () => {
      expect(formatSlaBreach({ pool: "gpu", observedMinutes: 4 / 3, slaMinutes: 1, waitingBuilds: 3 })).toBe(
        "queue wait time (1.33 minutes) for pool 'gpu' exceeded SLA (1 minutes)",
      );
    });
  });

  describe("figure", () => {
    it("publishes the rendered figure to the cache", async () => {
      cluster.enqueue("build", now - 3 * MINUTE).enqueue("build", now);

      const result = await createMonitor().run();

      expect(figureCache.getFigure()).toBe(result.figure);
      expect(result.figure.generatedAt).toBe(START);
      expect(result.figure.series).toEqual([
        { pool: "linux", points: [{ timestamp: START, minutes: 1.5 }] },
        { pool: "gpu", points: [{ timestamp: START, minutes: 0 }] },
      ]);
    });
  });

  describe("metrics", () => {
    it("exports the latest sample and breaches per pool", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      const metrics = new FairSchedulerMetrics({ collectDefaults: false });
      cluster
        .setEnv({ "poolmonitor.linux.sla": "1" })
        .enqueue("build", now - 3 * MINUTE)
        .enqueue("build", now);

      await createMonitor({ metrics }).run();

      const output = await metrics.getMetrics();
      expect(output).toContain('fairsched_pool_wait_minutes{pool="linux"} 1.5');
      expect(output).toContain('fairsched_pool_waiting_builds{pool="linux"} 2');
      expect(output).toContain('fairsched_pool_waiting_builds{pool="gpu"} 0');
      expect(output).toContain('fairsched_sla_breaches_total{pool="linux"} 1');
    });
  });

  describe("event log", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await mkdtemp(join(tmpdir(), "fairsched-monitor-"));
    });

    afterEach(async () => {
      await rm(tmpDir, { recursive: true, force: true });
    });

    it("records the sample and each breach", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = new EventLogger(tmpDir);
      cluster
        .setEnv({ "poolmonitor.linux.sla": "1" })
        .enqueue("build", now - 3 * MINUTE)
        .enqueue("build", now - MINUTE);

      await createMonitor({ logger }).run();

      const content = await readFile(join(tmpDir, "events.jsonl"), "utf-8");
      const events = content.trim().split("\n").map((line) => JSON.parse(line));
      expect(events.map((e) => e.type)).toEqual(["sla.sampled", "sla.violation"]);
      expect(events[0].payload).toEqual({ pools: { linux: { totalWaitMs: 4 * MINUTE, waitingBuilds: 2 } } });
      expect(events[1].pool).toBe("linux");
      expect(events[1].payload).toEqual({ pool: "linux", observedMinutes: 2, slaMinutes: 1, waitingBuilds: 2 });
    });
  });
});
