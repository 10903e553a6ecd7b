/**
 * Read-only views of the host scheduler's nodes and tasks, and the
 * verdicts the admission layer hands back.
 */

/** Point-in-time view of one worker node. */
export interface NodeSnapshot {
  readonly name: string;
  /** Assigned labels, always including the implicit self-label (the node's own name). */
  readonly labels: ReadonlySet<string>;
  readonly online: boolean;
  /** True when none of the node's executors is running a build. */
  readonly idle: boolean;
  readonly executors: number;
  readonly idleExecutors: number;
}

/** One retained build of a task. `builtOn` is absent when the node was removed or renamed. */
export interface BuildRecord {
  readonly number: number;
  readonly builtOn?: string;
}

/** Point-in-time view of a schedulable task (project). */
export interface TaskSnapshot {
  readonly name: string;
  /** Pool label the task is bound to; absent for unlabeled tasks. */
  readonly label?: string;
  /** Name of the node that ran the most recent build. */
  readonly lastBuiltOn?: string;
  /** Retained build history, oldest first. Absent when the task type keeps none. */
  readonly builds?: readonly BuildRecord[];
}

/** Verdict of an admission check: allowed, or blocked with a cause. */
export type AdmissionVerdict =
  | { allowed: true }
  | { allowed: false; reason: string };

/** Which branch of the fair dispatch procedure produced a decision. */
export type DecisionRule =
  | "unlabeled-task-native"
  | "unlabeled-task-pooled-node"
  | "sole-idle-node"
  | "least-used-node"
  | "not-least-used-node"
  | "no-least-used-native"
  | "last-built-on"
  | "not-last-built-on"
  | "fault-native";

export type AdmissionDecision = AdmissionVerdict & { rule: DecisionRule };

export const ALLOW: AdmissionVerdict = { allowed: true };

/** Blocked because the node should not take this task right now. */
export function nodeBusy(node: NodeSnapshot): AdmissionVerdict {
  return { allowed: false, reason: `Waiting for next available executor on ${node.name}` };
}

/** Host-facing admission hook, called once per probed (node, task) pair. */
export interface Dispatcher {
  canTake(node: NodeSnapshot, task: TaskSnapshot): AdmissionDecision;
}

/** Work the host runs on a fixed cadence. The period never changes after construction. */
export interface PeriodicTask<TResult = void> {
  readonly recurrencePeriodMs: number;
  run(): Promise<TResult>;
}
