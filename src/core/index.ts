/**
 * Core module - Shared functionality between the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./config/index.js";
export * from "./identity/index.js";
export * from "./credentials/index.js";
export * from "./reconciliation/index.js";
export * from "./adapters/index.js";
export * from "./sync/index.js";

// Re-export types
export * from "../types/index.js";
