#!/usr/bin/env node

/**
 * wizarr-authelia-sync CLI
 * Keeps Authelia's users file in step with the users invited through Wizarr
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { syncCommand } from "./commands/sync.js";
import { statusCommand } from "./commands/status.js";
import { configCommand } from "./commands/config.js";
import { installSignalHandlers } from "./shutdown.js";
import { ConfigurationError, isSyncError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Expected a whole number of seconds.");
  }
  return seconds;
}

// Create the main program
const program = new Command();

program
  .name("wizarr-authelia-sync")
  .description("Ensure every Wizarr user has an Authelia login")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("sync", { isDefault: true })
  .description("Create missing Authelia users and update changed emails")
  .option("-n, --dry-run", "Compute and log changes without writing or restarting")
  .option("-i, --interval <seconds>", "Repeat every N seconds (0 runs once)", parseSeconds)
  .option("--once", "Run a single pass even if SYNC_INTERVAL is set")
  .action(syncCommand);

program
  .command("status")
  .description("Show what the next sync would change")
  .option("-v, --verbose", "List every user")
  .action(statusCommand);

program
  .command("config")
  .description("Show the resolved configuration")
  .option("--json", "Print as JSON")
  .action(configCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof ConfigurationError) {
    logger.error({ err: error }, "Invalid configuration");
    console.error(chalk.red(`\n${error.message}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "Sync failed");
    const code = isSyncError(error) ? ` [${error.code}]` : "";
    console.error(chalk.red(`\nError${code}: ${error.message}`));
    if (process.env.DEBUG) {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

installSignalHandlers();

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
