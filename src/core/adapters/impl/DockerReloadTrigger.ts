/**
 * Docker reload trigger
 *
 * Authelia's file provider reads users at start-up, so a changed users
 * file only takes effect once its container restarts.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { IReloadTrigger, ReloadOutcome } from "../interfaces/IAdapters.js";
import { fromPromiseWith, type Result } from "../../../types/result.js";
import { ErrorCode, ReloadError } from "../../errors.js";
import { createLogger, type Logger } from "../../../utils/index.js";

const execFileAsync = promisify(execFile);

export const DEFAULT_RELOAD_TIMEOUT_MS = 30_000;

/**
 * Runs an executable and resolves with its output, rejecting on a non-zero
 * exit or when `timeoutMs` passes (the child is killed, `killed` is set)
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<{ stdout: string; stderr: string }>;

export const execFileRunner: CommandRunner = async (file, args, { timeoutMs }) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: timeoutMs,
    encoding: "utf8",
  });
  return { stdout, stderr };
};

export interface DockerReloadTriggerOptions {
  container: string;
  enabled: boolean;
  timeoutMs?: number;
  dockerBinary?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

export class DockerReloadTrigger implements IReloadTrigger {
  readonly target: string;
  private readonly enabled: boolean;
  private readonly timeoutMs: number;
  private readonly dockerBinary: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(options: DockerReloadTriggerOptions) {
    this.target = options.container;
    this.enabled = options.enabled;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RELOAD_TIMEOUT_MS;
    this.dockerBinary = options.dockerBinary ?? "docker";
    this.runner = options.runner ?? execFileRunner;
    this.logger = options.logger ?? createLogger("reload");
  }

  async reload(): Promise<Result<ReloadOutcome, ReloadError>> {
    if (!this.enabled) {
      this.logger.info("Authelia restart disabled, skipping");
      return { ok: true, value: "disabled" };
    }

    this.logger.info({ container: this.target }, "Restarting Authelia container");
    const result = await fromPromiseWith(
      this.runner(this.dockerBinary, ["restart", this.target], { timeoutMs: this.timeoutMs }),
      (error) => this.toReloadError(error)
    );

    if (!result.ok) {
      this.logger.error(
        { container: this.target, code: result.error.code, reason: result.error.reason },
        "Failed to restart Authelia"
      );
      return result;
    }

    this.logger.info({ container: this.target }, "Authelia container restarted successfully");
    return { ok: true, value: "restarted" };
  }

  private toReloadError(error: unknown): ReloadError {
    if (!(error instanceof Error)) {
      return new ReloadError("Error restarting Authelia container", ErrorCode.RELOAD_FAILED, {
        target: this.target,
        reason: String(error),
      });
    }

    if ("killed" in error && error.killed === true) {
      return new ReloadError("Timeout while restarting Authelia container", ErrorCode.RELOAD_TIMEOUT, {
        target: this.target,
        reason: `no response within ${this.timeoutMs}ms`,
      });
    }

    const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";
    return new ReloadError("Error restarting Authelia container", ErrorCode.RELOAD_FAILED, {
      target: this.target,
      reason: stderr || error.message,
    });
  }
}
