/**
 * Configuration Loader
 *
 * Reads the environment once into an immutable SyncConfig. Command-line
 * flags are applied on top as overrides.
 */

import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { formatZodError, safeValidate, type LogLevel } from "../../utils/index.js";

export interface SyncConfig {
  /** Wizarr's SQLite database */
  readonly wizarrDbPath: string;
  /** Authelia's users_database.yml */
  readonly autheliaUsersPath: string;
  readonly defaultGroup: string;
  readonly dryRun: boolean;
  /** Seconds between passes; 0 runs a single pass */
  readonly syncIntervalSeconds: number;
  readonly autheliaContainer: string;
  readonly restartAuthelia: boolean;
  readonly reloadTimeoutSeconds: number;
  /** File receiving generated passwords */
  readonly secureLogPath: string;
  readonly passwordLength: number;
  /** Abort the pass instead of starting over when the users file cannot be parsed */
  readonly strictTarget: boolean;
  /** Unset leaves the logger at its own default */
  readonly logLevel?: LogLevel;
}

export type ConfigOverrides = Partial<Pick<SyncConfig, "dryRun" | "syncIntervalSeconds">>;

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : value.toLowerCase() === "true"));

const seconds = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z.object({
  WIZARR_DB_PATH: z.string().default("/wizarr/database.db"),
  AUTHELIA_USERS_PATH: z.string().default("/authelia/users_database.yml"),
  DEFAULT_GROUP: z.string().default("plex_users"),
  DRY_RUN: flag(false),
  SYNC_INTERVAL: seconds(0),
  AUTHELIA_CONTAINER: z.string().default("authelia"),
  RESTART_AUTHELIA: flag(true),
  RELOAD_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(30),
  SECURE_LOG_PATH: z.string().default("/app/secure.log"),
  PASSWORD_LENGTH: z.coerce.number().int().min(1).max(128).default(16),
  STRICT_TARGET: flag(false),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["trace", "debug", "info", "warn", "error", "fatal"]))
    .optional(),
});

/**
 * Unset and blank variables both mean "use the default"
 */
function presentVariables(env: NodeJS.ProcessEnv): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }
  return present;
}

/**
 * Build the configuration for this process.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): SyncConfig {
  const parsed = safeValidate(EnvSchema, presentVariables(env));
  if (!parsed.success) {
    const issues = formatZodError(parsed.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const vars = parsed.data;
  const config: SyncConfig = {
    wizarrDbPath: vars.WIZARR_DB_PATH,
    autheliaUsersPath: vars.AUTHELIA_USERS_PATH,
    defaultGroup: vars.DEFAULT_GROUP,
    dryRun: overrides.dryRun ?? vars.DRY_RUN,
    syncIntervalSeconds: overrides.syncIntervalSeconds ?? vars.SYNC_INTERVAL,
    autheliaContainer: vars.AUTHELIA_CONTAINER,
    restartAuthelia: vars.RESTART_AUTHELIA,
    reloadTimeoutSeconds: vars.RELOAD_TIMEOUT_SECONDS,
    secureLogPath: vars.SECURE_LOG_PATH,
    passwordLength: vars.PASSWORD_LENGTH,
    strictTarget: vars.STRICT_TARGET,
    logLevel: vars.LOG_LEVEL,
  };

  if (!Number.isInteger(config.syncIntervalSeconds) || config.syncIntervalSeconds < 0) {
    throw new ConfigurationError("Sync interval must be a whole number of seconds", [
      `syncIntervalSeconds: ${config.syncIntervalSeconds}`,
    ]);
  }

  return Object.freeze(config);
}

/**
 * Human-readable summary, one entry per setting
 */
export function describeConfig(config: SyncConfig): Array<[label: string, value: string]> {
  return [
    ["Wizarr DB", config.wizarrDbPath],
    ["Authelia Users", config.autheliaUsersPath],
    ["Default Group", config.defaultGroup],
    ["Dry Run", String(config.dryRun)],
    ["Restart Authelia", String(config.restartAuthelia)],
    ["Authelia Container", config.autheliaContainer],
    ["Reload Timeout", `${config.reloadTimeoutSeconds}s`],
    [
      "Sync Interval",
      `${config.syncIntervalSeconds}s (${config.syncIntervalSeconds > 0 ? "periodic" : "run once"})`,
    ],
    ["Secure Log", config.secureLogPath],
    ["Password Length", String(config.passwordLength)],
    ["Strict Target", String(config.strictTarget)],
    ["Log Level", config.logLevel ?? "info"],
  ];
}
