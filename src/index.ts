/**
 * wizarr-authelia-sync
 *
 * Library entry point. The CLI lives in ./cli/index.ts.
 */

export * from "./core/index.js";
export { createLogger, CancellationTokenSource, CancellationToken } from "./utils/index.js";
export type { Logger, LogLevel } from "./utils/index.js";
