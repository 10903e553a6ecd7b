/**
 * SLA commands: one-shot sampling over a cluster state file.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import writeFileAtomic from "write-file-atomic";
import type { ClusterModel } from "../../host/cluster-model.js";
import { FileCluster } from "../../host/file-cluster.js";
import { LatestFigureCache } from "../../sla/figure-cache.js";
import { formatSlaBreach, PoolSlaMonitor, type SlaCycleResult } from "../../sla/pool-sla-monitor.js";

/** Run a single sampling cycle (windows start empty, so each series has one point). */
export async function sampleOnce(cluster: ClusterModel, now?: number): Promise<SlaCycleResult> {
  const monitor = new PoolSlaMonitor({
    cluster,
    queue: cluster,
    config: cluster,
    figureCache: new LatestFigureCache(),
    now: now === undefined ? undefined : () => now,
  });
  return monitor.run();
}

export function registerSlaCommands(program: Command): void {
  const sla = program
    .command("sla")
    .description("Pool SLA monitoring");

  sla
    .command("sample")
    .description("Sample queue wait times once and print the SLA figure")
    .requiredOption("--state <file>", "Cluster state file (YAML)")
    .option("--out <file>", "Write the figure JSON to a file instead of stdout")
    .action(async (opts: { state: string; out?: string }) => {
      const cluster = await FileCluster.open(opts.state);
      const result = await sampleOnce(cluster);
      const json = JSON.stringify(result.figure, null, 2) + "\n";

      if (opts.out) {
        const outPath = resolve(opts.out);
        await writeFileAtomic(outPath, json);
        console.log(`Figure written to ${outPath}`);
      } else {
        process.stdout.write(json);
      }

      if (result.breaches.length > 0) {
        for (const breach of result.breaches) {
          console.error(`⚠️  ${formatSlaBreach(breach)}`);
        }
        process.exitCode = 2;
      }
    });
}
