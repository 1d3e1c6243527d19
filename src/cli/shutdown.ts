/**
 * Shutdown coordination
 *
 * The first SIGINT/SIGTERM asks the running sync to stop once its current
 * pass is done; a second one exits immediately.
 */

import chalk from "chalk";
import { CancellationTokenSource, createLogger, type CancellationToken } from "../utils/index.js";

const logger = createLogger("cli");

const source = new CancellationTokenSource();

export function shutdownToken(): CancellationToken {
  return source.token;
}

function onSignal(signal: NodeJS.Signals): void {
  if (source.token.cancelled) {
    logger.warn({ signal }, "Forced shutdown");
    process.exit(1);
  }

  logger.info({ signal }, "Received shutdown signal");
  console.error(chalk.dim(`\nReceived ${signal}, finishing the current pass...`));
  source.cancel(signal);
}

export function installSignalHandlers(): void {
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}
