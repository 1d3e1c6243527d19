/**
 * Shared utilities
 */

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// Re-export async helpers
export * from "./async.js";

// Re-export validation helpers
export * from "./validation.js";
