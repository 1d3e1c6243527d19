/**
 * Authelia users document codec
 *
 * Maps the file provider's YAML layout to TargetDocument and back:
 *
 * ```yaml
 * users:
 *   alice:
 *     displayname: Alice
 *     password: $argon2id$v=19$m=65536,t=3,p=4$...
 *     email: alice@example.com
 *     groups:
 *       - plex_users
 * ```
 */

import { parseDocument, stringify } from "yaml";
import { z } from "zod";
import type { TargetCredentialRecord, TargetDocument, TargetStore } from "../../../types/index.js";
import { err, ok, type Result } from "../../../types/result.js";
import { ErrorCode, TargetStoreError } from "../../errors.js";
import { safeValidate } from "../../../utils/index.js";

const OWNED_KEYS: ReadonlySet<string> = new Set(["displayname", "password", "email", "groups"]);

const UserEntrySchema = z.object({
  displayname: z.string(),
  password: z.string(),
  email: z
    .string()
    .nullish()
    .transform((email) => email ?? ""),
  groups: z
    .array(z.string())
    .nullish()
    .transform((groups) => groups ?? []),
});

/**
 * Define `key` as an own property, so "__proto__" is stored like any other key
 */
function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function toRecord(map: Map<unknown, unknown>): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [key, value] of map) {
    setOwn(record, String(key), value);
  }
  return record;
}

export function emptyDocument(): TargetDocument {
  return { users: new Map(), unmanaged: new Map(), extra: {} };
}

/**
 * Parse the users file. An empty file is an empty document.
 *
 * Only a YAML syntax error or a top level / `users` that is not a mapping
 * makes the file malformed. An entry that does not fit the login layout is
 * kept in `unmanaged` and written back as it was.
 */
export function parseUsersDocument(
  text: string,
  targetPath: string
): Result<TargetDocument, TargetStoreError> {
  const malformed = (message: string) =>
    err(new TargetStoreError(message, ErrorCode.TARGET_MALFORMED, { targetPath }));

  // Repeated keys are accepted; the last one wins
  const parsed = parseDocument(text, { uniqueKeys: false });
  const syntaxError = parsed.errors[0];
  if (syntaxError) {
    return malformed(`Users file is not valid YAML: ${syntaxError.message}`);
  }

  const raw: unknown = parsed.toJS({ mapAsMap: true });
  if (raw === null || raw === undefined) {
    return ok(emptyDocument());
  }
  if (!(raw instanceof Map)) {
    return malformed("Users file must be a mapping at the top level");
  }

  const users: TargetStore = new Map();
  const unmanaged = new Map<string, unknown>();
  const extra: Record<string, unknown> = {};
  let rawUsers: unknown = null;

  const topLevel: Map<unknown, unknown> = raw;
  for (const [key, value] of topLevel) {
    if (key === "users") {
      rawUsers = value;
    } else {
      setOwn(extra, String(key), value);
    }
  }

  if (rawUsers !== null && rawUsers !== undefined) {
    if (!(rawUsers instanceof Map)) {
      return malformed("'users' must be a mapping of username to user");
    }

    const entries: Map<unknown, unknown> = rawUsers;
    for (const [key, entry] of entries) {
      const username = String(key);
      const record = entry instanceof Map ? parseUserEntry(toRecord(entry)) : null;
      if (record) {
        users.set(username, record);
      } else {
        unmanaged.set(username, entry);
      }
    }
  }

  return ok({ users, unmanaged, extra });
}

function parseUserEntry(entry: Record<string, unknown>): TargetCredentialRecord | null {
  const parsed = safeValidate(UserEntrySchema, entry);
  if (!parsed.success) {
    return null;
  }

  const attributes: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!OWNED_KEYS.has(key)) {
      setOwn(attributes, key, value);
    }
  }

  return {
    displayName: parsed.data.displayname,
    passwordHash: parsed.data.password,
    email: parsed.data.email,
    groups: parsed.data.groups,
    attributes,
  };
}

function serializeRecord(record: TargetCredentialRecord): Map<string, unknown> {
  return new Map<string, unknown>([
    ["displayname", record.displayName],
    ["password", record.passwordHash],
    ["email", record.email],
    ["groups", [...record.groups]],
    ...Object.entries(record.attributes),
  ]);
}

export function serializeUsersDocument(document: TargetDocument): string {
  const users = new Map<string, unknown>();
  for (const [username, record] of document.users) {
    users.set(username, serializeRecord(record));
  }
  for (const [username, entry] of document.unmanaged) {
    users.set(username, entry);
  }
  const root = new Map<string, unknown>([["users", users], ...Object.entries(document.extra)]);
  return stringify(root, { indent: 2, lineWidth: 0 });
}
