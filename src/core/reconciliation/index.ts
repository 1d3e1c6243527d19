/**
 * Reconciliation Module
 *
 * Diffs invited users against the gateway's users and computes the
 * create/update operations for one pass.
 */

// Interfaces
export * from "./interfaces/IReconciliation.js";

// Planning
export * from "./plan.js";

// Implementation
export * from "./impl/Reconciler.js";
