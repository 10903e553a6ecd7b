/**
 * Fair dispatcher: admission veto that spreads a task's builds evenly
 * across the nodes of its pool.
 *
 * The host probes every candidate (node, task) pair through `canTake()`.
 * Rules, in order:
 *
 * 1. Unlabeled task: a node with no label besides its own name follows its
 *    native check; a pooled node is reserved for pooled tasks and blocks.
 * 2. Labeled task:
 *    a. the candidate is the only idle node of the pool → allow;
 *    b. the usage histogram has data → allow only the least-used node;
 *       if no least-used node can be found, defer to the native check;
 *    c. no usable history → block the node the task last ran on, allow others.
 *
 * Nothing here may throw back into the host: a fault in an admission
 * callback gets the probed node marked unhealthy. Any unexpected failure
 * defers to the node's native check instead.
 */

import type { IClusterView } from "../host/interfaces.js";
import type { FairSchedulerMetrics } from "../metrics/exporter.js";
import { createDiagnostics, errorMessage } from "../logging/diagnostics.js";
import { findIdleLabeledNodes } from "./idle-nodes.js";
import { hasOnlySelfLabel } from "./labels.js";
import { findLeastUsed } from "./least-used.js";
import { buildUsageHistogram, totalUsage } from "./usage-histogram.js";
import {
  ALLOW,
  nodeBusy,
  type AdmissionDecision,
  type AdmissionVerdict,
  type DecisionRule,
  type Dispatcher,
  type NodeSnapshot,
  type TaskSnapshot,
} from "./types.js";

export interface FairDispatcherOptions {
  metrics?: FairSchedulerMetrics;
}

const log = createDiagnostics("FairDispatcher");

function decided(verdict: AdmissionVerdict, rule: DecisionRule): AdmissionDecision {
  return { ...verdict, rule };
}

function describeVerdict(verdict: AdmissionVerdict): string {
  return verdict.allowed ? "ALLOW" : `BLOCK (${verdict.reason})`;
}

export class FairDispatcher implements Dispatcher {
  private readonly cluster: IClusterView;
  private readonly metrics?: FairSchedulerMetrics;

  constructor(cluster: IClusterView, options: FairDispatcherOptions = {}) {
    this.cluster = cluster;
    this.metrics = options.metrics;
  }

  canTake(node: NodeSnapshot, task: TaskSnapshot): AdmissionDecision {
    let decision: AdmissionDecision;
    try {
      decision = this.decide(node, task);
    } catch (err) {
      log.severe(
        `for task ${task.name}: admission heuristic failed on node ${node.name} ` +
          `(${errorMessage(err)}). fallback to native check`,
      );
      decision = this.native(node, task, "fault-native");
    }
    this.metrics?.recordDecision(decision.rule, decision.allowed);
    return decision;
  }

  private decide(node: NodeSnapshot, task: TaskSnapshot): AdmissionDecision {
    if (task.label === undefined) {
      return this.decideUnlabeled(node, task);
    }

    const histogram = buildUsageHistogram(this.cluster, task);
    const idleLabeledNodes = findIdleLabeledNodes(this.cluster, task);

    if (idleLabeledNodes.length === 1 && idleLabeledNodes[0]?.name === node.name) {
      log.fine(
        `for task ${task.name}: node ${node.name} is the only idle node in pool ` +
          `${task.label}. ALLOW regardless of other heuristics`,
      );
      return decided(ALLOW, "sole-idle-node");
    }

    if (histogram && histogram.size > 0 && totalUsage(histogram) > 0) {
      const leastUsed = findLeastUsed(this.cluster, task, histogram);
      if (!leastUsed) {
        const decision = this.native(node, task, "no-least-used-native");
        log.fine(
          `for task ${task.name}: no least-used node found. ` +
            `fallback to native check. decision=${describeVerdict(decision)}`,
        );
        return decision;
      }
      if (leastUsed.name === node.name) {
        log.fine(`for task ${task.name}: node ${node.name} *is* the least used node. ALLOW`);
        return decided(ALLOW, "least-used-node");
      }
      log.fine(
        `for task ${task.name}: node ${node.name} *is not* the least used node ` +
          `${leastUsed.name}. BLOCK`,
      );
      return decided(nodeBusy(node), "not-least-used-node");
    }

    if (task.lastBuiltOn === node.name) {
      log.fine(`for task ${task.name}: task last ran on node ${node.name}. BLOCK`);
      return decided(nodeBusy(node), "last-built-on");
    }

    log.fine(`for task ${task.name}: task did not last run on node ${node.name}. ALLOW`);
    return decided(ALLOW, "not-last-built-on");
  }

  private decideUnlabeled(node: NodeSnapshot, task: TaskSnapshot): AdmissionDecision {
    if (hasOnlySelfLabel(node)) {
      const decision = this.native(node, task, "unlabeled-task-native");
      log.fine(
        `for task ${task.name}: node ${node.name} has no label other than its name. ` +
          `obey node configuration. decision=${describeVerdict(decision)}`,
      );
      return decision;
    }

    log.fine(
      `for task ${task.name}: task has no label, node ${node.name} belongs to a pool. BLOCK`,
    );
    return decided(nodeBusy(node), "unlabeled-task-pooled-node");
  }

  /** The node's own verdict. If even that throws, the node is left alone for this round. */
  private native(node: NodeSnapshot, task: TaskSnapshot, rule: DecisionRule): AdmissionDecision {
    try {
      return decided(this.cluster.nativeCanTake(node, task), rule);
    } catch (err) {
      log.severe(
        `for task ${task.name}: native admission check failed on node ${node.name}: ` +
          errorMessage(err),
      );
      return decided({ allowed: false, reason: "admission check failed" }, rule);
    }
  }
}
