/**
 * Dispatch commands: inspect admission decisions against a cluster state file.
 */

import type { Command } from "commander";
import { FairDispatcher } from "../../dispatch/fair-dispatcher.js";
import { findLeastUsed } from "../../dispatch/least-used.js";
import { buildUsageHistogram, totalUsage } from "../../dispatch/usage-histogram.js";
import type { ClusterModel } from "../../host/cluster-model.js";
import { FileCluster } from "../../host/file-cluster.js";

/** Render the decision for one (node, task) pair. */
export function formatDecision(cluster: ClusterModel, nodeName: string, taskName: string): string {
  const node = cluster.getNode(nodeName);
  if (!node) throw new Error(`Node not found: ${nodeName}`);
  const task = cluster.getTask(taskName);
  if (!task) throw new Error(`Task not found: ${taskName}`);

  const decision = new FairDispatcher(cluster).canTake(node, task);
  const verdict = decision.allowed ? "ALLOW" : `BLOCK: ${decision.reason}`;
  return `${task.name} on ${node.name}: ${verdict} [${decision.rule}]`;
}

/** Render a task's usage histogram and its least-used node. */
export function formatUsage(cluster: ClusterModel, taskName: string): string {
  const task = cluster.getTask(taskName);
  if (!task) throw new Error(`Task not found: ${taskName}`);
  if (task.label === undefined) return `${task.name} has no label; usage is not tracked`;

  const histogram = buildUsageHistogram(cluster, task);
  if (!histogram) return `${task.name} keeps no build history`;

  const lines = [`Usage of ${task.name} in pool ${task.label}:`];
  for (const [node, count] of histogram) {
    lines.push(`  ${node.padEnd(24)} ${count}`);
  }
  lines.push(`  total: ${totalUsage(histogram)}`);
  lines.push(`  least used: ${findLeastUsed(cluster, task, histogram)?.name ?? "none available"}`);
  return lines.join("\n");
}

export function registerDispatchCommands(program: Command): void {
  program
    .command("decide")
    .description("Show the admission decision for a task on a node")
    .requiredOption("--state <file>", "Cluster state file (YAML)")
    .requiredOption("--node <name>", "Candidate node")
    .requiredOption("--task <name>", "Task (job) name")
    .action(async (opts: { state: string; node: string; task: string }) => {
      const cluster = await FileCluster.open(opts.state);
      console.log(formatDecision(cluster, opts.node, opts.task));
    });

  program
    .command("usage")
    .description("Show a task's node usage histogram")
    .requiredOption("--state <file>", "Cluster state file (YAML)")
    .requiredOption("--task <name>", "Task (job) name")
    .action(async (opts: { state: string; task: string }) => {
      const cluster = await FileCluster.open(opts.state);
      console.log(formatUsage(cluster, opts.task));
    });
}
