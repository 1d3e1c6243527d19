/**
 * Logger Module
 * Structured logging using pino with pretty console output on terminals
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTestRun(): boolean {
  return process.env.VITEST !== undefined || process.env.NODE_ENV === "test";
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default.
 * Test runs stay quiet unless LOG_LEVEL asks otherwise.
 */
function getLogLevel(): LogLevel | "silent" {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return isTestRun() ? "silent" : "info";
}

let baseLogger: PinoLogger | null = null;
const componentLoggers: PinoLogger[] = [];

function getBaseLogger(): PinoLogger {
  if (baseLogger) return baseLogger;

  const baseOptions: pino.LoggerOptions = {
    name: "wizarr-authelia-sync",
    level: getLogLevel(),
  };

  // Pretty printing only for humans watching a terminal
  if (isDevelopment() && !isTestRun() && process.stdout.isTTY) {
    baseLogger = pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,name",
        },
      },
    });
  } else {
    baseLogger = pino(baseOptions);
  }
  return baseLogger;
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "reconciler", "sync-driver")
 *
 * @example
 * ```typescript
 * const logger = createLogger("reconciler");
 * logger.info({ username }, "Creating new Authelia user");
 * logger.error({ err }, "Sync failed");
 * ```
 */
export function createLogger(component: string): PinoLogger {
  const child = getBaseLogger().child({ component });
  componentLoggers.push(child);
  return child;
}

/**
 * Change the level of every logger, including ones already created
 */
export function setLogLevel(level: LogLevel): void {
  getBaseLogger().level = level;
  for (const logger of componentLoggers) {
    logger.level = level;
  }
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
