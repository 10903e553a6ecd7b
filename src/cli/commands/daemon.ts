/**
 * Daemon command: run the SLA monitor and HTTP surface in the foreground.
 */

import type { Command } from "commander";
import { startFairSchedulerDaemon } from "../../daemon/daemon.js";

export function registerDaemonCommands(program: Command): void {
  program
    .command("daemon")
    .description("Run the scheduler daemon (SLA sampling + HTTP endpoints)")
    .requiredOption("--state <file>", "Cluster state file (YAML), re-read every cycle")
    .option("--port <port>", "HTTP port", process.env["FAIRSCHED_DAEMON_PORT"] ?? "18000")
    .option("--bind <addr>", "HTTP bind address", process.env["FAIRSCHED_DAEMON_BIND"] ?? "127.0.0.1")
    .action(async (opts: { state: string; port: string; bind: string }) => {
      const port = parseInt(opts.port, 10);
      if (Number.isNaN(port) || port < 0) {
        console.error("Invalid --port (must be a non-negative integer)");
        process.exitCode = 1;
        return;
      }

      const { root } = program.opts<{ root: string }>();
      const daemon = await startFairSchedulerDaemon({
        dataDir: root,
        statePath: opts.state,
        port,
        bind: opts.bind,
      });

      console.log(`[FairScheduler] Daemon started. Endpoints: http://${opts.bind}:${port}/{health,sla,metrics,decide}`);

      const shutdown = async (): Promise<void> => {
        await daemon.stop();
        process.exit(0);
      };

      process.on("SIGINT", () => void shutdown());
      process.on("SIGTERM", () => void shutdown());
    });
}
