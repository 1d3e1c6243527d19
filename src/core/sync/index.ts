/**
 * Sync Module
 *
 * Runs reconciliation passes once or on an interval.
 */

// Interfaces
export * from "./interfaces/ISyncDriver.js";

// Implementation
export * from "./impl/SyncDriver.js";
export * from "./factory.js";
