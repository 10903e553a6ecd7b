/**
 * Cluster state schema: the YAML file a standalone daemon reads in place
 * of a live host: nodes, jobs with their retained builds, the buildable
 * queue and the global environment.
 *
 * ```yaml
 * nodes:
 *   - name: linux-01
 *     labels: [linux]
 *     executors: 2
 * jobs:
 *   - name: api-build
 *     label: linux
 *     builds:
 *       - { number: 1, builtOn: linux-01 }
 * queue:
 *   - { job: api-build, buildableSince: "2026-01-05T10:00:00Z" }
 * env:
 *   poolmonitor.linux.sla: "30"
 * ```
 */

import { z } from "zod";

/** How a node treats tasks that are not bound to one of its labels. */
export const NodeMode = z.enum(["normal", "exclusive"]);
export type NodeMode = z.infer<typeof NodeMode>;

export const NodeConfig = z.object({
  name: z.string().min(1),
  /** User-defined labels; the self-label is implicit. */
  labels: z.array(z.string().min(1)).default([]),
  online: z.boolean().default(true),
  /** False while the node is temporarily taken out of service. */
  acceptingTasks: z.boolean().default(true),
  mode: NodeMode.default("normal"),
  executors: z.number().int().nonnegative().default(1),
  busyExecutors: z.number().int().nonnegative().default(0),
});
export type NodeConfig = z.infer<typeof NodeConfig>;

export const BuildEntry = z.object({
  number: z.number().int().positive(),
  /** Absent when the node that ran it no longer exists. */
  builtOn: z.string().min(1).optional(),
});
export type BuildEntry = z.infer<typeof BuildEntry>;

export const JobConfig = z.object({
  name: z.string().min(1),
  label: z.string().min(1).optional(),
  /** Defaults to the node of the newest build. */
  lastBuiltOn: z.string().min(1).optional(),
  /** False for job types that keep no build history. */
  keepsHistory: z.boolean().default(true),
  /** Oldest first. */
  builds: z.array(BuildEntry).default([]),
});
export type JobConfig = z.infer<typeof JobConfig>;

export const QueueEntry = z.object({
  job: z.string().min(1),
  /** Epoch ms or ISO-8601 timestamp. */
  buildableSince: z.union([z.number().int().nonnegative(), z.string().datetime()]),
});
export type QueueEntry = z.infer<typeof QueueEntry>;

export const ClusterState = z.object({
  nodes: z.array(NodeConfig).default([]),
  jobs: z.array(JobConfig).default([]),
  queue: z.array(QueueEntry).default([]),
  /** Global key/value environment; omit when the host has none. */
  env: z.record(z.string(), z.string()).optional(),
});
export type ClusterState = z.infer<typeof ClusterState>;
