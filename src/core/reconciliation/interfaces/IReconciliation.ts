/**
 * Reconciliation Interfaces
 *
 * Defines the contract for bringing the gateway's users in line with the
 * invited users of the source directory.
 */

import type { SourceUser, SyncOutcome, TargetStore } from "../../../types/index.js";
import type { IdentityRejection } from "../../identity/index.js";

// =============================================================================
// Decisions
// =============================================================================

/**
 * Why a source user was left alone: a bad identity, or an existing entry
 * under that username that is not a readable login
 */
export type SkipReason = IdentityRejection | "unmanaged-entry";

/**
 * What a pass does about one source user
 */
export type ReconcileDecision =
  | { kind: "create"; user: SourceUser }
  | { kind: "update-email"; user: SourceUser; previousEmail: string }
  | { kind: "unchanged"; user: SourceUser }
  | { kind: "skip"; user: SourceUser; reason: SkipReason };

/**
 * Decisions for a whole source list, in source order
 */
export interface ReconcilePlan {
  decisions: ReconcileDecision[];
  outcome: SyncOutcome;
  skippedCount: number;
}

// =============================================================================
// Reconciliation Result
// =============================================================================

export interface ReconcileResult {
  /** The updated mapping; the input mapping is left as it was */
  target: TargetStore;
  outcome: SyncOutcome;
  decisions: ReconcileDecision[];
}

// =============================================================================
// Reconciler Interface
// =============================================================================

export interface IReconciler {
  /**
   * Create logins for unseen users and update changed emails.
   *
   * New plaintext secrets leave through the injected credential channel,
   * once each. Usernames in `unmanaged` are skipped. Nothing is persisted
   * here.
   *
   * @throws HashingError when a new credential cannot be hashed
   */
  reconcile(
    sourceUsers: readonly SourceUser[],
    target: TargetStore,
    defaultGroup: string,
    unmanaged?: ReadonlySet<string>
  ): Promise<ReconcileResult>;
}

/**
 * Whether a result needs to be written back
 */
export function hasChanges(outcome: SyncOutcome): boolean {
  return outcome.createdCount + outcome.updatedCount > 0;
}
