import type { IClusterView } from "../host/interfaces.js";
import type { NodeSnapshot, TaskSnapshot } from "./types.js";
import type { UsageHistogram } from "./usage-histogram.js";

/**
 * Pick the least-used node of a histogram that can start the task now:
 * at least one idle executor and a passing native check.
 *
 * Equal counts go to the lexicographically lowest node name.
 * Returns `undefined` when no node in the histogram has a free executor.
 */
export function findLeastUsed(
  cluster: IClusterView,
  task: TaskSnapshot,
  histogram: UsageHistogram,
): NodeSnapshot | undefined {
  let best: NodeSnapshot | undefined;
  let minimum = Number.POSITIVE_INFINITY;

  for (const [name, count] of histogram) {
    const node = cluster.getNode(name);
    if (!node || !node.online || node.idleExecutors < 1) continue;
    if (!cluster.nativeCanTake(node, task).allowed) continue;

    if (count < minimum || (count === minimum && best !== undefined && node.name < best.name)) {
      best = node;
      minimum = count;
    }
  }

  return best;
}
