/**
 * File-backed cluster: ClusterState read from a YAML (or JSON) file and
 * re-read on every refresh.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { ClusterState } from "../schemas/cluster.js";
import { ClusterModel } from "./cluster-model.js";
import type { IRefreshable } from "./interfaces.js";

/**
 * Parse and validate a cluster state document.
 *
 * @throws Error listing every schema issue when the document is invalid
 */
export function parseClusterState(content: string, source = "cluster state"): ClusterState {
  const raw: unknown = parseYaml(content);
  const result = ClusterState.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid ${source}:\n${issues}`);
  }
  return result.data;
}

export async function loadClusterState(path: string): Promise<ClusterState> {
  const content = await readFile(path, "utf-8");
  return parseClusterState(content, path);
}

export class FileCluster extends ClusterModel implements IRefreshable {
  readonly path: string;

  private constructor(path: string, state: ClusterState) {
    super(state);
    this.path = path;
  }

  static async open(path: string): Promise<FileCluster> {
    return new FileCluster(path, await loadClusterState(path));
  }

  /** Reload the file. On failure the previous state stays in place and the error propagates. */
  async refresh(): Promise<void> {
    this.state = await loadClusterState(this.path);
  }
}
