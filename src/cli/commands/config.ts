/**
 * config command - Print the resolved configuration
 */

import chalk from "chalk";
import { describeConfig, loadConfig } from "../../core/config/index.js";

export interface ConfigOptions {
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  const config = loadConfig();

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold("Configuration"));
  console.log(chalk.dim("─".repeat(40)));
  for (const [label, value] of describeConfig(config)) {
    console.log(`  ${chalk.dim(label.padEnd(20))}${value}`);
  }
  console.log();
}
