/**
 * Shared types for wizarr-authelia-sync
 */

// =============================================================================
// Source Directory
// =============================================================================

/**
 * A user as listed by the source directory (one Wizarr invitation)
 */
export interface SourceUser {
  readonly username: string;
  readonly email: string;
}

// =============================================================================
// Target Credential Store
// =============================================================================

/**
 * One login in the gateway's users database, keyed by username
 */
export interface TargetCredentialRecord {
  displayName: string;
  /** Self-describing Argon2id PHC string */
  passwordHash: string;
  email: string;
  groups: string[];
  /** Entry keys this system does not own, written back untouched */
  attributes: Record<string, unknown>;
}

/**
 * The gateway's users, in document order
 */
export type TargetStore = Map<string, TargetCredentialRecord>;

/**
 * The whole users document
 */
export interface TargetDocument {
  users: TargetStore;
  /** Entries under `users` that are not logins this system can read, kept verbatim */
  unmanaged: Map<string, unknown>;
  /** Top-level keys other than `users` */
  extra: Record<string, unknown>;
}

// =============================================================================
// Sync Results
// =============================================================================

/**
 * Counts reported for one reconciliation pass
 */
export interface SyncOutcome {
  createdCount: number;
  updatedCount: number;
}

export * from "./result.js";
