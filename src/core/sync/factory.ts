/**
 * Wires the production adapters for one process
 */

import { SyncDriver } from "./impl/SyncDriver.js";
import type { SyncConfig } from "../config/index.js";
import {
  Argon2CredentialGenerator,
  createCredentialChannel,
  type ICredentialChannel,
} from "../credentials/index.js";
import { Reconciler } from "../reconciliation/index.js";
import { DockerReloadTrigger, SqliteSourceAdapter, YamlTargetStore } from "../adapters/index.js";
import { createLogger, setLogLevel } from "../../utils/index.js";

export interface SyncRuntime {
  driver: SyncDriver;
  channel: ICredentialChannel;
  /** Release the secure log */
  close(): void;
}

export function createSyncRuntime(config: SyncConfig): SyncRuntime {
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
  const logger = createLogger("sync");

  const channel = createCredentialChannel(
    { secureLogPath: config.secureLogPath, dryRun: config.dryRun },
    logger
  );

  const reconciler = new Reconciler({
    credentials: new Argon2CredentialGenerator({ secretLength: config.passwordLength }),
    channel,
  });

  const driver = new SyncDriver(config, {
    source: new SqliteSourceAdapter(config.wizarrDbPath),
    target: new YamlTargetStore(config.autheliaUsersPath),
    reloader: new DockerReloadTrigger({
      container: config.autheliaContainer,
      enabled: config.restartAuthelia,
      timeoutMs: config.reloadTimeoutSeconds * 1000,
    }),
    reconciler,
  });

  return { driver, channel, close: () => channel.close() };
}
