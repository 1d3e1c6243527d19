/**
 * status command - Show what the next sync would change
 */

import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../core/config/index.js";
import { SqliteSourceAdapter, YamlTargetStore } from "../../core/adapters/index.js";
import { planReconciliation, type ReconcileDecision } from "../../core/reconciliation/index.js";
import type { SourceUser } from "../../types/index.js";
import { createLogger, setLogLevel } from "../../utils/index.js";

const logger = createLogger("status");

export interface StatusOptions {
  verbose?: boolean;
}

function describeDecision(decision: ReconcileDecision): string {
  const name = decision.user.username;
  switch (decision.kind) {
    case "create":
      return `${chalk.green("+")} ${name} ${chalk.dim(`(${decision.user.email})`)}`;
    case "update-email":
      return `${chalk.yellow("~")} ${name} ${chalk.dim(`${decision.previousEmail} -> ${decision.user.email}`)}`;
    case "unchanged":
      return `${chalk.dim("=")} ${name}`;
    case "skip":
      return `${chalk.red("!")} ${name} ${chalk.dim(`(${decision.reason})`)}`;
  }
}

/**
 * Compare both stores without hashing or writing anything
 */
export async function statusCommand(options: StatusOptions): Promise<void> {
  const config = loadConfig();
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
  logger.info({ options }, "Checking status");

  const spinner = ora("Reading Wizarr users...").start();

  let users: SourceUser[];
  try {
    users = await new SqliteSourceAdapter(config.wizarrDbPath, logger).listUsers();
  } catch (error) {
    spinner.fail(chalk.red("Could not read Wizarr users"));
    throw error;
  }

  spinner.text = "Reading Authelia users...";
  const loaded = await new YamlTargetStore(config.autheliaUsersPath, logger).load();
  spinner.succeed("Read Wizarr and Authelia users");

  const plan = planReconciliation(
    users,
    loaded.document.users,
    new Set(loaded.document.unmanaged.keys())
  );
  const unchanged = plan.decisions.filter((d) => d.kind === "unchanged").length;

  console.log();
  console.log(chalk.bold("Sync status"));
  console.log(chalk.dim("─".repeat(40)));
  console.log(`  Wizarr users:    ${users.length}`);
  console.log(`  Authelia users:  ${loaded.document.users.size} ${chalk.dim(`(${loaded.state})`)}`);
  console.log(`  Would create:    ${chalk.green(plan.outcome.createdCount)}`);
  console.log(`  Would update:    ${chalk.yellow(plan.outcome.updatedCount)}`);
  console.log(`  Skipped:         ${chalk.red(plan.skippedCount)}`);
  console.log(`  In sync:         ${unchanged}`);

  if (loaded.state === "unreadable" || loaded.state === "malformed") {
    console.log();
    console.log(chalk.yellow(`Warning: ${loaded.error.message}`));
  }

  if (options.verbose && plan.decisions.length > 0) {
    console.log();
    for (const decision of plan.decisions) {
      console.log(`  ${describeDecision(decision)}`);
    }
  }
  console.log();
}
