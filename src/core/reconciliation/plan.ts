/**
 * Reconciliation planning
 *
 * Pure decision step shared by the reconciler and the status command.
 */

import type { SourceUser, TargetStore } from "../../types/index.js";
import { checkIdentity } from "../identity/index.js";
import type { ReconcileDecision, ReconcilePlan } from "./interfaces/IReconciliation.js";

/**
 * Decide what to do about one source user given the email currently on
 * record for that username (undefined when there is no record)
 */
export function decide(
  user: SourceUser,
  existingEmail: string | undefined,
  unmanaged = false
): ReconcileDecision {
  const rejection = checkIdentity(user);
  if (rejection) {
    return { kind: "skip", user, reason: rejection };
  }
  if (unmanaged) {
    return { kind: "skip", user, reason: "unmanaged-entry" };
  }
  if (existingEmail === undefined) {
    return { kind: "create", user };
  }
  if (existingEmail !== user.email) {
    return { kind: "update-email", user, previousEmail: existingEmail };
  }
  return { kind: "unchanged", user };
}

/**
 * Decide every source user against the target without touching either.
 *
 * A username listed twice is decided against the state the earlier sighting
 * leaves behind, as the reconciler would.
 */
export function planReconciliation(
  sourceUsers: readonly SourceUser[],
  target: TargetStore,
  unmanaged: ReadonlySet<string> = new Set()
): ReconcilePlan {
  const emails = new Map<string, string>();
  for (const [username, record] of target) {
    emails.set(username, record.email);
  }

  const decisions: ReconcileDecision[] = [];
  let createdCount = 0;
  let updatedCount = 0;
  let skippedCount = 0;

  for (const user of sourceUsers) {
    const decision = decide(user, emails.get(user.username), unmanaged.has(user.username));
    decisions.push(decision);

    switch (decision.kind) {
      case "create":
        createdCount++;
        emails.set(user.username, user.email);
        break;
      case "update-email":
        updatedCount++;
        emails.set(user.username, user.email);
        break;
      case "skip":
        skippedCount++;
        break;
      case "unchanged":
        break;
    }
  }

  return { decisions, outcome: { createdCount, updatedCount }, skippedCount };
}

/**
 * Display name for a new login: each letter that follows a non-letter is
 * upper-cased and every other letter lower-cased ("john.doe" -> "John.Doe")
 */
export function toDisplayName(username: string): string {
  let result = "";
  let previousIsLetter = false;
  for (const ch of username) {
    const isLetter = ch.toLowerCase() !== ch.toUpperCase();
    if (isLetter) {
      result += previousIsLetter ? ch.toLowerCase() : ch.toUpperCase();
    } else {
      result += ch;
    }
    previousIsLetter = isLetter;
  }
  return result;
}
