/**
 * Reconciler Implementation
 *
 * Applies the per-user decisions to a copy of the target store, issuing a
 * credential for every new login.
 */

import type { SourceUser, TargetCredentialRecord, TargetStore } from "../../../types/index.js";
import type {
  IReconciler,
  ReconcileDecision,
  ReconcileResult,
  SkipReason,
} from "../interfaces/IReconciliation.js";
import type { ICredentialChannel, ICredentialGenerator } from "../../credentials/index.js";
import { obfuscateSecret } from "../../credentials/index.js";
import { decide, toDisplayName } from "../plan.js";
import { createLogger, type Logger } from "../../../utils/index.js";

export interface ReconcilerDependencies {
  credentials: ICredentialGenerator;
  channel: ICredentialChannel;
  logger?: Logger;
}

export class Reconciler implements IReconciler {
  private readonly credentials: ICredentialGenerator;
  private readonly channel: ICredentialChannel;
  private readonly logger: Logger;

  constructor(deps: ReconcilerDependencies) {
    this.credentials = deps.credentials;
    this.channel = deps.channel;
    this.logger = deps.logger ?? createLogger("reconciler");
  }

  async reconcile(
    sourceUsers: readonly SourceUser[],
    target: TargetStore,
    defaultGroup: string,
    unmanaged: ReadonlySet<string> = new Set()
  ): Promise<ReconcileResult> {
    const next: TargetStore = new Map(target);
    const decisions: ReconcileDecision[] = [];
    let createdCount = 0;
    let updatedCount = 0;

    for (const user of sourceUsers) {
      const existing = next.get(user.username);
      const decision = decide(user, existing?.email, unmanaged.has(user.username));
      decisions.push(decision);

      if (decision.kind === "skip") {
        this.logSkip(user, decision.reason);
      } else if (decision.kind === "update-email" && existing) {
        this.logger.info(
          { username: user.username, from: decision.previousEmail, to: user.email },
          "Updating email"
        );
        next.set(user.username, { ...existing, email: user.email });
        updatedCount++;
      } else if (decision.kind === "create") {
        const record = await this.issueRecord(user, defaultGroup);
        next.set(user.username, record);
        createdCount++;
      } else {
        this.logger.debug({ username: user.username }, "User already exists with correct email");
      }
    }

    return { target: next, outcome: { createdCount, updatedCount }, decisions };
  }

  private logSkip(user: SourceUser, reason: SkipReason): void {
    switch (reason) {
      case "invalid-username":
        this.logger.warn({ username: user.username }, "Skipping user: invalid username format");
        break;
      case "invalid-email":
        this.logger.warn(
          { username: user.username, email: user.email },
          "Skipping user: invalid email format"
        );
        break;
      case "unmanaged-entry":
        this.logger.warn(
          { username: user.username },
          "Skipping user: existing Authelia entry is not a readable login, leaving it as is"
        );
        break;
    }
  }

  private async issueRecord(user: SourceUser, defaultGroup: string): Promise<TargetCredentialRecord> {
    const secret = this.credentials.generateSecret();
    const passwordHash = await this.credentials.hashSecret(secret);

    this.logger.info({ username: user.username, email: user.email }, "Creating new Authelia user");
    await this.announceCredential(user.username, secret);

    return {
      displayName: toDisplayName(user.username),
      passwordHash,
      email: user.email,
      groups: [defaultGroup],
      attributes: {},
    };
  }

  private async announceCredential(username: string, secret: string): Promise<void> {
    this.logger.warn({ username, password: obfuscateSecret(secret) }, "Generated password");

    const delivery = await this.channel.deliver(username, secret);
    if (delivery.delivered) {
      this.logger.info(
        { username, file: delivery.destination },
        "Full password written to secure log"
      );
      return;
    }

    switch (delivery.reason) {
      case "dry-run":
        this.logger.info({ username }, "DRY RUN: password not recorded");
        break;
      case "unavailable":
      case "write-failed":
        this.logger.warn(
          { username },
          "Full password not logged anywhere; set SECURE_LOG_PATH to a writable file to keep generated passwords"
        );
        this.logger.warn({ username }, "Password must be provided to the user manually");
        break;
    }
  }
}
