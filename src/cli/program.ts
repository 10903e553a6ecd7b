/**
 * fairsched CLI: fair dispatch inspection and pool SLA monitoring.
 *
 * This module configures the Commander program with all commands registered.
 * It is separated from the entrypoint (index.ts) so the program can be
 * imported without triggering parseAsync.
 */

import { resolve } from "node:path";
import { homedir } from "node:os";
import { Command } from "commander";
import { registerDaemonCommands } from "./commands/daemon.js";
import { registerDispatchCommands } from "./commands/dispatch.js";
import { registerSlaCommands } from "./commands/sla.js";

const FAIRSCHED_ROOT = process.env["FAIRSCHED_ROOT"] ?? resolve(homedir(), ".fairsched");

export const program = new Command()
  .name("fairsched")
  .version("0.1.0")
  .description("Fair build distribution across node pools, with pool SLA monitoring")
  .option("--root <path>", "Data directory (events, PID file)", FAIRSCHED_ROOT);

registerDispatchCommands(program);
registerSlaCommands(program);
registerDaemonCommands(program);
