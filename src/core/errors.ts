/**
 * Error Classes for wizarr-authelia-sync
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",

  // Source store errors (2xxx)
  SOURCE_UNAVAILABLE = "E2000",
  SOURCE_QUERY_FAILED = "E2001",

  // Target store errors (3xxx)
  TARGET_UNREADABLE = "E3000",
  TARGET_MALFORMED = "E3001",
  TARGET_WRITE_FAILED = "E3002",

  // Credential errors (4xxx)
  HASHING_FAILED = "E4000",

  // Reload errors (5xxx)
  RELOAD_FAILED = "E5000",
  RELOAD_TIMEOUT = "E5001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all sync errors
 */
export class SyncError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SyncError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid or incomplete configuration
 */
export class ConfigurationError extends SyncError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_INVALID, context);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * The source user directory is missing or could not be queried
 */
export class SourceUnavailableError extends SyncError {
  public readonly sourcePath: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SOURCE_UNAVAILABLE,
    context: Record<string, unknown> & { sourcePath: string }
  ) {
    super(message, code, context);
    this.name = "SourceUnavailableError";
    this.sourcePath = context.sourcePath;
  }
}

/**
 * The target credential store could not be read or parsed
 */
export class TargetStoreError extends SyncError {
  public readonly targetPath: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TARGET_UNREADABLE,
    context: Record<string, unknown> & { targetPath: string }
  ) {
    super(message, code, context);
    this.name = "TargetStoreError";
    this.targetPath = context.targetPath;
  }
}

/**
 * The target credential store could not be written
 */
export class PersistenceError extends SyncError {
  public readonly targetPath: string;

  constructor(message: string, context: Record<string, unknown> & { targetPath: string }) {
    super(message, ErrorCode.TARGET_WRITE_FAILED, context);
    this.name = "PersistenceError";
    this.targetPath = context.targetPath;
  }
}

/**
 * The password hashing primitive failed
 */
export class HashingError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.HASHING_FAILED, context);
    this.name = "HashingError";
  }
}

/**
 * The consuming service could not be reloaded
 */
export class ReloadError extends SyncError {
  public readonly target: string;
  public readonly reason: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RELOAD_FAILED,
    context: Record<string, unknown> & { target: string; reason: string }
  ) {
    super(message, code, context);
    this.name = "ReloadError";
    this.target = context.target;
    this.reason = context.reason;
  }
}

/**
 * Check if an error is a SyncError
 */
export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Extract a readable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
}
