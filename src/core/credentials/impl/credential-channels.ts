/**
 * Credential Channels
 *
 * Where a freshly issued plaintext secret goes. The channel is picked once
 * at startup and injected into the reconciler.
 */

import * as path from "node:path";
import pino, { type Logger as PinoLogger } from "pino";
import type { CredentialDelivery, ICredentialChannel } from "../interfaces/ICredentials.js";
import { errorMessage } from "../../errors.js";
import { isWritableDirectory, type Logger } from "../../../utils/index.js";

/**
 * Append-only JSON lines file readable by the administrator only
 */
export class SecureLogCredentialChannel implements ICredentialChannel {
  readonly kind = "secure-log" as const;
  private readonly destination: ReturnType<typeof pino.destination>;
  private readonly sink: PinoLogger;

  constructor(
    readonly filePath: string,
    private readonly logger: Logger
  ) {
    this.destination = pino.destination({
      dest: filePath,
      append: true,
      sync: true,
      mkdir: true,
      mode: 0o600,
    });
    this.sink = pino(
      { base: null, level: "info", timestamp: pino.stdTimeFunctions.isoTime },
      this.destination
    );
  }

  async deliver(username: string, secret: string): Promise<CredentialDelivery> {
    try {
      this.sink.info({ username, password: secret }, "Issued credential");
      return { delivered: true, destination: this.filePath };
    } catch (error) {
      // The secret itself must not leak into the operational log
      this.logger.error(
        { username, file: this.filePath, reason: errorMessage(error) },
        "Could not write to secure log"
      );
      return { delivered: false, reason: "write-failed" };
    }
  }

  close(): void {
    this.destination.end();
  }
}

/**
 * No secure sink configured: plaintext secrets are dropped
 */
export class UnavailableCredentialChannel implements ICredentialChannel {
  readonly kind = "unavailable" as const;

  async deliver(): Promise<CredentialDelivery> {
    return { delivered: false, reason: "unavailable" };
  }

  close(): void {}
}

/**
 * Dry runs issue nothing, so nothing is kept
 */
export class DryRunCredentialChannel implements ICredentialChannel {
  readonly kind = "dry-run" as const;

  async deliver(): Promise<CredentialDelivery> {
    return { delivered: false, reason: "dry-run" };
  }

  close(): void {}
}

export interface CredentialChannelOptions {
  secureLogPath?: string;
  dryRun: boolean;
}

/**
 * Pick the channel for this process.
 *
 * The secure log is only used when its directory already exists and is
 * writable; a bad mount must not end up creating a world-readable tree.
 */
export function createCredentialChannel(
  options: CredentialChannelOptions,
  logger: Logger
): ICredentialChannel {
  if (options.dryRun) {
    return new DryRunCredentialChannel();
  }

  const filePath = options.secureLogPath;
  if (filePath && isWritableDirectory(path.dirname(filePath))) {
    try {
      return new SecureLogCredentialChannel(filePath, logger);
    } catch (error) {
      logger.warn({ file: filePath, reason: errorMessage(error) }, "Secure log could not be opened");
    }
  }

  logger.warn(
    { file: filePath ?? null },
    "Secure log not configured; generated passwords will not be recorded anywhere"
  );
  return new UnavailableCredentialChannel();
}
