/**
 * ClusterModel: host interfaces backed by a plain ClusterState value.
 *
 * Used by the standalone daemon and CLI (state read from YAML) and by the
 * in-process test cluster. Snapshots are derived from the state on every
 * call, so mutations to the state are visible immediately.
 */

import type { AdmissionVerdict, NodeSnapshot, TaskSnapshot } from "../dispatch/types.js";
import type { ClusterState, JobConfig, NodeConfig } from "../schemas/cluster.js";
import type {
  IBuildQueue,
  IClusterView,
  IHostConfig,
  ITaskCatalog,
  QueuedBuild,
} from "./interfaces.js";

export function toNodeSnapshot(node: NodeConfig): NodeSnapshot {
  const busy = Math.min(node.busyExecutors, node.executors);
  return {
    name: node.name,
    labels: new Set([node.name, ...node.labels]),
    online: node.online,
    idle: busy === 0,
    executors: node.executors,
    idleExecutors: node.executors - busy,
  };
}

export function toTaskSnapshot(job: JobConfig): TaskSnapshot {
  const newest = job.builds[job.builds.length - 1];
  return {
    name: job.name,
    label: job.label,
    lastBuiltOn: job.lastBuiltOn ?? newest?.builtOn,
    builds: job.keepsHistory ? job.builds.map((b) => ({ number: b.number, builtOn: b.builtOn })) : undefined,
  };
}

function toEpochMs(value: number | string): number {
  return typeof value === "number" ? value : new Date(value).getTime();
}

export class ClusterModel implements IClusterView, ITaskCatalog, IBuildQueue, IHostConfig {
  protected state: ClusterState;

  constructor(state: ClusterState) {
    this.state = state;
  }

  listNodes(): NodeSnapshot[] {
    return this.state.nodes.map(toNodeSnapshot);
  }

  getNode(name: string): NodeSnapshot | undefined {
    const node = this.state.nodes.find((n) => n.name === name);
    return node ? toNodeSnapshot(node) : undefined;
  }

  labelMembers(label: string): NodeSnapshot[] {
    return this.listNodes().filter((node) => node.labels.has(label));
  }

  listLabels(): string[] {
    const labels = new Set<string>();
    for (const node of this.state.nodes) {
      for (const label of node.labels) labels.add(label);
      labels.add(node.name);
    }
    return [...labels];
  }

  /**
   * A node takes a task when it is online and in service, carries the
   * task's label, or (for unlabeled tasks) is not reserved for labeled work.
   */
  nativeCanTake(node: NodeSnapshot, task: TaskSnapshot): AdmissionVerdict {
    const config = this.state.nodes.find((n) => n.name === node.name);
    if (!config) {
      return { allowed: false, reason: `${node.name} no longer exists` };
    }
    if (!config.online) {
      return { allowed: false, reason: `${node.name} is offline` };
    }
    if (!config.acceptingTasks) {
      return { allowed: false, reason: `${node.name} is not accepting tasks` };
    }
    if (task.label !== undefined) {
      if (!node.labels.has(task.label)) {
        return { allowed: false, reason: `${node.name} doesn't have label ${task.label}` };
      }
      return { allowed: true };
    }
    if (config.mode === "exclusive") {
      return { allowed: false, reason: `${node.name} is reserved for jobs with matching label expression` };
    }
    return { allowed: true };
  }

  getTask(name: string): TaskSnapshot | undefined {
    const job = this.state.jobs.find((j) => j.name === name);
    return job ? toTaskSnapshot(job) : undefined;
  }

  /** Queue entries naming a job that no longer exists are dropped. */
  buildableItems(): QueuedBuild[] {
    const items: QueuedBuild[] = [];
    for (const entry of this.state.queue) {
      const task = this.getTask(entry.job);
      if (!task) continue;
      items.push({ task, buildableSince: toEpochMs(entry.buildableSince) });
    }
    return items;
  }

  globalEnv(): Readonly<Record<string, string>> | undefined {
    return this.state.env;
  }
}
