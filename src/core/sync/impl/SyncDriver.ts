/**
 * Sync Driver Implementation
 *
 * Orchestrates reconciliation passes: read both stores, reconcile, persist
 * and reload when something changed.
 */

import type { ISyncDriver, PassReport, SyncDriverSettings } from "../interfaces/ISyncDriver.js";
import type { IReloadTrigger, ISourceAdapter, ITargetStore } from "../../adapters/index.js";
import type { IReconciler } from "../../reconciliation/index.js";
import { hasChanges } from "../../reconciliation/index.js";
import { SourceUnavailableError } from "../../errors.js";
import type { SourceUser } from "../../../types/index.js";
import {
  cancellableSleep,
  createLogger,
  type CancellationToken,
  type Logger,
} from "../../../utils/index.js";

export interface SyncDriverDependencies {
  source: ISourceAdapter;
  target: ITargetStore;
  reloader: IReloadTrigger;
  reconciler: IReconciler;
  logger?: Logger;
}

function endedEarly(status: "source-unavailable" | "no-source-users"): PassReport {
  return {
    status,
    outcome: { createdCount: 0, updatedCount: 0 },
    targetState: null,
    backupPath: null,
    reload: null,
  };
}

export class SyncDriver implements ISyncDriver {
  private readonly source: ISourceAdapter;
  private readonly target: ITargetStore;
  private readonly reloader: IReloadTrigger;
  private readonly reconciler: IReconciler;
  private readonly logger: Logger;

  constructor(
    private readonly settings: SyncDriverSettings,
    deps: SyncDriverDependencies
  ) {
    this.source = deps.source;
    this.target = deps.target;
    this.reloader = deps.reloader;
    this.reconciler = deps.reconciler;
    this.logger = deps.logger ?? createLogger("sync-driver");
  }

  async runPass(): Promise<PassReport> {
    this.logger.info("Starting sync");

    let sourceUsers: SourceUser[];
    try {
      sourceUsers = await this.source.listUsers();
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        this.logger.warn({ code: error.code, source: error.sourcePath }, error.message);
        return endedEarly("source-unavailable");
      }
      throw error;
    }

    if (sourceUsers.length === 0) {
      this.logger.warn("No Wizarr users found, nothing to sync");
      return endedEarly("no-source-users");
    }

    const loaded = await this.target.load();
    switch (loaded.state) {
      case "missing":
        this.logger.warn({ file: this.target.location }, "Authelia users file not found, starting empty");
        break;
      case "unreadable":
      case "malformed":
        if (this.settings.strictTarget) {
          throw loaded.error;
        }
        this.logger.warn(
          { file: this.target.location, code: loaded.error.code, reason: loaded.error.message },
          "Authelia users file could not be used, treating it as empty"
        );
        break;
      case "loaded":
        break;
    }

    const { users, unmanaged, extra } = loaded.document;
    if (unmanaged.size > 0) {
      this.logger.warn(
        { usernames: [...unmanaged.keys()] },
        "Authelia entries that are not readable logins will be kept as they are"
      );
    }
    const result = await this.reconciler.reconcile(
      sourceUsers,
      users,
      this.settings.defaultGroup,
      new Set(unmanaged.keys())
    );
    const { createdCount, updatedCount } = result.outcome;

    if (!hasChanges(result.outcome)) {
      this.logger.info("No changes needed - all users are in sync");
      return {
        status: "in-sync",
        outcome: result.outcome,
        targetState: loaded.state,
        backupPath: null,
        reload: null,
      };
    }

    if (this.settings.dryRun) {
      this.logger.info({ createdCount, updatedCount }, "DRY RUN: Would save Authelia users file");
      this.logger.info({ container: this.reloader.target }, "DRY RUN: Would restart Authelia container");
      return {
        status: "dry-run",
        outcome: result.outcome,
        targetState: loaded.state,
        backupPath: null,
        reload: null,
      };
    }

    const backupPath = loaded.state === "malformed" ? await this.target.backup() : null;
    await this.target.save({ users: result.target, unmanaged, extra });

    const reload = await this.reloader.reload();
    if (reload.ok) {
      this.logger.info({ createdCount, updatedCount }, "Sync complete");
    } else {
      this.logger.warn(
        { createdCount, updatedCount, reason: reload.error.reason },
        "Users updated but Authelia restart failed - changes may not be active"
      );
    }

    return { status: "synced", outcome: result.outcome, targetState: loaded.state, backupPath, reload };
  }

  async runForever(token: CancellationToken): Promise<number> {
    const seconds = this.settings.syncIntervalSeconds;
    this.logger.info({ seconds }, "Running in periodic mode");

    let passes = 0;
    while (!token.cancelled) {
      let failed = false;
      try {
        await this.runPass();
      } catch (error) {
        failed = true;
        this.logger.error({ err: error }, "Sync failed");
      }
      passes++;

      if (token.cancelled) break;

      this.logger.info(
        { seconds },
        failed ? "Retrying after the sync interval" : "Waiting until next sync"
      );
      const elapsed = await cancellableSleep(seconds * 1000, token);
      if (!elapsed) break;
    }

    this.logger.info({ passes, reason: token.reason ?? null }, "Shutting down gracefully");
    return passes;
  }

  async run(token: CancellationToken): Promise<void> {
    if (this.settings.syncIntervalSeconds > 0) {
      await this.runForever(token);
      return;
    }
    await this.runPass();
    this.logger.info("Sync finished successfully");
  }
}
