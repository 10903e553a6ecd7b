import type { IClusterView } from "../host/interfaces.js";
import type { NodeSnapshot } from "./types.js";

/**
 * Every node implicitly carries a label equal to its own name. A label
 * whose only member is the node it is named after is that synthetic
 * self-label, not a pool somebody configured.
 */
export function isTruePool(label: string, members: readonly NodeSnapshot[]): boolean {
  return !(members.length === 1 && members[0]?.name === label);
}

/** True when the node carries no label besides its own name. */
export function hasOnlySelfLabel(node: NodeSnapshot): boolean {
  for (const label of node.labels) {
    if (label !== node.name) return false;
  }
  return true;
}

/** Labels the host knows about that are real pools, in the host's order. */
export function listTruePools(cluster: IClusterView): string[] {
  return cluster.listLabels().filter((label) => isTruePool(label, cluster.labelMembers(label)));
}
