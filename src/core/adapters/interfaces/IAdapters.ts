/**
 * Store Adapter Interfaces
 *
 * The outside world as the sync driver sees it: a read-only source
 * directory, a whole-document target store and a reload trigger.
 */

import type { SourceUser, TargetDocument } from "../../../types/index.js";
import type { Result } from "../../../types/result.js";
import type { ReloadError, TargetStoreError } from "../../errors.js";

// =============================================================================
// Source
// =============================================================================

export interface ISourceAdapter {
  /** Where users are read from, for log messages */
  readonly location: string;

  /**
   * List every invited user that has an email, in source order.
   *
   * @throws SourceUnavailableError when the store is missing or unreadable
   */
  listUsers(): Promise<SourceUser[]>;
}

// =============================================================================
// Target
// =============================================================================

/**
 * How the last load went. Anything but "loaded" yields an empty document.
 */
export type TargetLoadState = "loaded" | "missing" | "unreadable" | "malformed";

export type TargetLoadResult =
  | { state: "loaded"; document: TargetDocument }
  | { state: "missing"; document: TargetDocument }
  | { state: "unreadable" | "malformed"; document: TargetDocument; error: TargetStoreError };

export interface ITargetStore {
  readonly location: string;

  /**
   * Read the whole document. Never throws for a missing, unreadable or
   * malformed file; the state says which.
   */
  load(): Promise<TargetLoadResult>;

  /**
   * Replace the whole document atomically.
   *
   * @throws PersistenceError
   */
  save(document: TargetDocument): Promise<void>;

  /**
   * Copy the current file aside before it is overwritten.
   *
   * @returns the backup path, or null when there is no file
   * @throws PersistenceError
   */
  backup(): Promise<string | null>;
}

// =============================================================================
// Reload
// =============================================================================

export type ReloadOutcome = "restarted" | "disabled";

export interface IReloadTrigger {
  /** Logical name of the consuming service */
  readonly target: string;

  /**
   * Ask the consuming service to re-read its credential store.
   * Failures are returned, never thrown.
   */
  reload(): Promise<Result<ReloadOutcome, ReloadError>>;
}
