#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import { alertsCommand } from "./commands/alerts";
import { authCommand } from "./commands/auth";
import { consumptionCommand } from "./commands/consumption";
import { fetchCommand } from "./commands/fetch";
import { cfg } from "./lib/config";
import { formatError, log } from "./lib/log";

// Capture any uncaught async errors
process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection:", formatError(reason));
  process.exitCode = 1;
});

// Capture any uncaught sync errors
process.on("uncaughtException", (err) => {
  log.error("Uncaught exception:", formatError(err));
  process.exitCode = 1;
});

async function main() {
  // Auto-help only when no args at all
  const argv = process.argv.slice(2);
  const args = argv.length === 0 ? ["--help"] : argv;

  const program = new Command();
  program
    .name(cfg.appName)
    .version(cfg.version)
    .description(`${cfg.appName}: water consumption and alerts from the customer portal`);

  program.addCommand(authCommand);
  program.addCommand(consumptionCommand);
  program.addCommand(alertsCommand);
  program.addCommand(fetchCommand);

  await program.parseAsync([process.argv[0] ?? "node", process.argv[1] ?? cfg.appName, ...args]);
}

main().catch((e: unknown) => {
  log.error(formatError(e));
  process.exitCode = 1;
});
