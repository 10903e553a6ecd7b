/**
 * Node usage histogram: how many retained builds of a task ran on each node.
 *
 * Only nodes that can take the task right now appear: a pool member that is
 * disabled or offline is left out even at zero, and a node that ran the task
 * but has since been relabelled drops out. Builds whose node was removed or
 * renamed are skipped.
 */

import type { IClusterView } from "../host/interfaces.js";
import { createDiagnostics } from "../logging/diagnostics.js";
import type { NodeSnapshot, TaskSnapshot } from "./types.js";

/** Node name → completed build count, in insertion order. */
export type UsageHistogram = ReadonlyMap<string, number>;

const log = createDiagnostics("NodeUsage");

/**
 * Build the usage histogram for a labeled task.
 *
 * Returns `undefined` when the task is unlabeled or keeps no build history.
 */
export function buildUsageHistogram(
  cluster: IClusterView,
  task: TaskSnapshot,
): UsageHistogram | undefined {
  if (task.label === undefined || task.builds === undefined) {
    return undefined;
  }

  // One native check per node per call.
  const eligibility = new Map<string, boolean>();
  const canTakeNow = (node: NodeSnapshot): boolean => {
    let eligible = eligibility.get(node.name);
    if (eligible === undefined) {
      eligible = cluster.nativeCanTake(node, task).allowed;
      eligibility.set(node.name, eligible);
      if (!eligible) {
        log.fine(`node ${node.name} can't take task ${task.name} at this time`);
      }
    }
    return eligible;
  };

  const frequency = new Map<string, number>();
  for (const member of cluster.labelMembers(task.label)) {
    if (canTakeNow(member)) frequency.set(member.name, 0);
  }

  for (const build of task.builds) {
    if (build.builtOn === undefined) continue;
    const node = cluster.getNode(build.builtOn);
    if (!node || !canTakeNow(node)) continue;

    frequency.set(node.name, (frequency.get(node.name) ?? 0) + 1);
  }

  log.fine(`node usage map for task ${task.name}:${formatHistogram(frequency)}`);
  return frequency;
}

/** Sum of builds across every node in the histogram. */
export function totalUsage(histogram: UsageHistogram): number {
  let sum = 0;
  for (const count of histogram.values()) sum += count;
  return sum;
}

export function formatHistogram(histogram: UsageHistogram): string {
  let out = "";
  for (const [node, count] of histogram) out += ` ${node}=>${count}`;
  return out;
}
