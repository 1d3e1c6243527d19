/**
 * Sync Driver Interfaces
 */

import type { SyncOutcome } from "../../../types/index.js";
import type { Result } from "../../../types/result.js";
import type { ReloadError } from "../../errors.js";
import type { ReloadOutcome, TargetLoadState } from "../../adapters/index.js";
import type { SyncConfig } from "../../config/index.js";
import type { CancellationToken } from "../../../utils/index.js";

/**
 * How a pass ended
 *
 * - source-unavailable: the source could not be read, nothing was done
 * - no-source-users: the source listed nobody
 * - in-sync: nothing to change
 * - dry-run: changes were computed and not written
 * - synced: changes were written
 */
export type PassStatus = "source-unavailable" | "no-source-users" | "in-sync" | "dry-run" | "synced";

export interface PassReport {
  status: PassStatus;
  outcome: SyncOutcome;
  /** Null when the pass ended before the target was read */
  targetState: TargetLoadState | null;
  /** Where an unparseable users file was copied before being replaced */
  backupPath: string | null;
  /** Null when no reload was attempted */
  reload: Result<ReloadOutcome, ReloadError> | null;
}

export type SyncDriverSettings = Pick<
  SyncConfig,
  "defaultGroup" | "dryRun" | "syncIntervalSeconds" | "strictTarget"
>;

export interface ISyncDriver {
  /**
   * One reconciliation pass.
   *
   * @throws HashingError, PersistenceError, or TargetStoreError in strict mode
   */
  runPass(): Promise<PassReport>;

  /**
   * Passes separated by the configured interval until the token is
   * cancelled. Failed passes are logged and retried after the interval.
   *
   * @returns the number of passes run
   */
  runForever(token: CancellationToken): Promise<number>;

  /**
   * A single pass when the interval is 0, otherwise runForever
   */
  run(token: CancellationToken): Promise<void>;
}
