import type { IClusterView } from "../host/interfaces.js";
import type { NodeSnapshot, TaskSnapshot } from "./types.js";

/**
 * Nodes that carry the task's label and could start it immediately:
 * online, fully idle, with at least one executor, and passing their
 * native check.
 *
 * Unlabeled tasks have no pool, so the result is empty for them.
 */
export function findIdleLabeledNodes(cluster: IClusterView, task: TaskSnapshot): NodeSnapshot[] {
  const label = task.label;
  if (label === undefined) return [];

  return cluster.listNodes().filter(
    (node) =>
      node.labels.size > 0 &&
      node.labels.has(label) &&
      node.online &&
      node.idle &&
      node.executors > 0 &&
      cluster.nativeCanTake(node, task).allowed,
  );
}
