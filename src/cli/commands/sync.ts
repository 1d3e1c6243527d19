/**
 * sync command - Reconcile Wizarr users into Authelia
 */

import { loadConfig, describeConfig } from "../../core/config/index.js";
import { createSyncRuntime } from "../../core/sync/index.js";
import { createLogger } from "../../utils/index.js";
import { shutdownToken } from "../shutdown.js";

export interface SyncOptions {
  dryRun?: boolean;
  interval?: number;
  once?: boolean;
}

/**
 * Run one pass, or keep running when an interval is configured
 */
export async function syncCommand(options: SyncOptions): Promise<void> {
  const logger = createLogger("sync");

  const config = loadConfig(process.env, {
    dryRun: options.dryRun || undefined,
    syncIntervalSeconds: options.once ? 0 : options.interval,
  });

  logger.info(Object.fromEntries(describeConfig(config)), "wizarr-authelia-sync starting");

  const runtime = createSyncRuntime(config);
  try {
    await runtime.driver.run(shutdownToken());
  } finally {
    runtime.close();
  }
}
