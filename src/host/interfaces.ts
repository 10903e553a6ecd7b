/**
 * Interfaces to the host scheduler. Everything here is owned by the host;
 * the admission layer only reads through them.
 *
 * Lookups return `undefined` for anything that no longer exists.
 */

import type { AdmissionVerdict, NodeSnapshot, TaskSnapshot } from "../dispatch/types.js";

export interface IClusterView {
  /** All nodes known to the host, in the host's own order. */
  listNodes(): readonly NodeSnapshot[];
  getNode(name: string): NodeSnapshot | undefined;
  /** Nodes currently carrying `label` (self-labels included). */
  labelMembers(label: string): readonly NodeSnapshot[];
  /** Every label the host knows about, synthetic self-labels included. */
  listLabels(): readonly string[];
  /** The node's own admission check, independent of any fairness heuristic. */
  nativeCanTake(node: NodeSnapshot, task: TaskSnapshot): AdmissionVerdict;
}

export interface ITaskCatalog {
  getTask(name: string): TaskSnapshot | undefined;
}

/** A build waiting in the queue that could start as soon as a node admits it. */
export interface QueuedBuild {
  readonly task: TaskSnapshot;
  /** Epoch ms since which the item has been buildable. */
  readonly buildableSince: number;
}

export interface IBuildQueue {
  buildableItems(): readonly QueuedBuild[];
}

/** Global key/value environment owned by the host. */
export interface IHostConfig {
  /** Undefined when the host has no global environment configured. */
  globalEnv(): Readonly<Record<string, string>> | undefined;
}

/** Sources that must be re-read before they reflect the host again. */
export interface IRefreshable {
  refresh(): Promise<void>;
}
