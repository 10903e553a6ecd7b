import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileCluster, parseClusterState } from "../file-cluster.js";

const STATE = `
nodes:
  - name: linux-01
    labels: [linux]
    executors: 2
  - name: linux-02
    labels: [linux]
jobs:
  - name: api-build
    label: linux
    builds:
      - { number: 1, builtOn: linux-01 }
queue:
  - { job: api-build, buildableSince: "2026-01-05T10:00:00Z" }
env:
  poolmonitor.linux.sla: "30"
`;

describe("parseClusterState", () => {
  it("applies schema defaults", () => {
    const state = parseClusterState(STATE);

    expect(state.nodes[1]).toEqual({
      name: "linux-02",
      labels: ["linux"],
      online: true,
      acceptingTasks: true,
      mode: "normal",
      executors: 1,
      busyExecutors: 0,
    });
    expect(state.env).toEqual({ "poolmonitor.linux.sla": "30" });
  });

  it("treats an empty document as an empty cluster", () => {
    expect(parseClusterState("")).toEqual({ nodes: [], jobs: [], queue: [] });
  });

  it("lists every schema issue", () => {
    const bad = "nodes:\n  - labels: [linux]\njobs:\n  - name: api\n    builds:\n      - { number: 0 }\n";

    expect(() => parseClusterState(bad, "state.yaml")).toThrow(
      "Invalid state.yaml:\n  nodes.0.name: Required\n  jobs.0.builds.0.number: Number must be greater than 0",
    );
  });
});

describe("FileCluster", () => {
  let tmpDir: string;
  let statePath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "fairsched-cluster-"));
    statePath = join(tmpDir, "cluster.yaml");
    await writeFile(statePath, STATE, "utf-8");
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("reads the state file", async () => {
    const cluster = await FileCluster.open(statePath);

    expect(cluster.listNodes().map((n) => n.name)).toEqual(["linux-01", "linux-02"]);
    expect(cluster.getTask("api-build")?.lastBuiltOn).toBe("linux-01");
  });

  it("picks up changes on refresh", async () => {
    const cluster = await FileCluster.open(statePath);
    await writeFile(statePath, "nodes:\n  - name: linux-03\n", "utf-8");

    await cluster.refresh();

    expect(cluster.listNodes().map((n) => n.name)).toEqual(["linux-03"]);
  });

  it("keeps the previous state when a refresh fails", async () => {
    const cluster = await FileCluster.open(statePath);
    await writeFile(statePath, "nodes: 5\n", "utf-8");

    await expect(cluster.refresh()).rejects.toThrow(/Invalid/);
    expect(cluster.listNodes()).toHaveLength(2);
  });
});
