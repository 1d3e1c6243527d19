/**
 * Users document codec tests
 */

import { describe, it, expect } from "vitest";
import { parse } from "yaml";
import { parseUsersDocument, serializeUsersDocument } from "../impl/users-document.js";
import { ErrorCode } from "../../errors.js";
import type { TargetDocument } from "../../../types/index.js";

const TARGET = "/authelia/users_database.yml";

const SAMPLE = `
users:
  alice:
    displayname: Alice
    password: "$argon2id$v=19$m=65536,t=3,p=4$c2FsdA$aGFzaA"
    email: alice@example.com
    groups:
      - plex_users
  bob:
    displayname: Bob Admin
    password: "$argon2id$v=19$m=65536,t=3,p=4$c2FsdDI$aGFzaDI"
    email: bob@example.com
    groups:
      - admins
      - plex_users
    disabled: true
`;

describe("parseUsersDocument", () => {
  it("should read users in document order", () => {
    const result = parseUsersDocument(SAMPLE, TARGET);

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect([...result.value.users.keys()]).toEqual(["alice", "bob"]);
    expect(result.value.users.get("alice")).toEqual({
      displayName: "Alice",
      passwordHash: "$argon2id$v=19$m=65536,t=3,p=4$c2FsdA$aGFzaA",
      email: "alice@example.com",
      groups: ["plex_users"],
      attributes: {},
    });
  });

  it("should keep keys it does not own", () => {
    const result = parseUsersDocument(`${SAMPLE}\nnotes: managed by hand\n`, TARGET);

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.users.get("bob")?.attributes).toEqual({ disabled: true });
    expect(result.value.extra).toEqual({ notes: "managed by hand" });
  });

  it("should default a missing email and groups", () => {
    const result = parseUsersDocument(
      "users:\n  carol:\n    displayname: Carol\n    password: hash\n",
      TARGET
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.users.get("carol")).toMatchObject({ email: "", groups: [] });
  });

  it.each([
    ["an empty file", ""],
    ["a comment only", "# no users yet\n"],
    ["an empty users key", "users:\n"],
  ])("should treat %s as an empty document", (_label, text) => {
    const result = parseUsersDocument(text, TARGET);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.users.size).toBe(0);
  });

  it.each([
    ["invalid YAML", "users: [unclosed"],
    ["a top-level list", "- alice\n- bob\n"],
    ["users as a list", "users:\n  - alice\n"],
  ])("should reject %s as malformed", (_label, text) => {
    const result = parseUsersDocument(text, TARGET);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.TARGET_MALFORMED);
    expect(result.error.targetPath).toBe(TARGET);
  });

  it("should read a null email and empty groups as blank", () => {
    const result = parseUsersDocument(
      "users:\n  admin:\n    displayname: Admin\n    password: hash\n    email: ~\n    groups:\n",
      TARGET
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.users.get("admin")).toEqual({
      displayName: "Admin",
      passwordHash: "hash",
      email: "",
      groups: [],
      attributes: {},
    });
    expect(result.value.unmanaged.size).toBe(0);
  });

  it.each([
    ["a scalar entry", "users:\n  alice: yes\n  bob:\n    displayname: Bob\n    password: h\n", "yes"],
    [
      "an entry without a display name",
      "users:\n  alice:\n    password: h\n  bob:\n    displayname: Bob\n    password: h\n",
      new Map([["password", "h"]]),
    ],
    [
      "non-string groups",
      "users:\n  alice:\n    displayname: A\n    password: h\n    groups: [1]\n  bob:\n    displayname: Bob\n    password: h\n",
      new Map<string, unknown>([
        ["displayname", "A"],
        ["password", "h"],
        ["groups", [1]],
      ]),
    ],
  ])("should keep %s aside and read the rest", (_label, text, kept) => {
    const result = parseUsersDocument(text, TARGET);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect([...result.value.users.keys()]).toEqual(["bob"]);
    expect(result.value.unmanaged.get("alice")).toEqual(kept);
  });

  it("should take the last of repeated usernames", () => {
    const result = parseUsersDocument(
      "users:\n  alice:\n    displayname: Old\n    password: h1\n  alice:\n    displayname: New\n    password: h2\n",
      TARGET
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.users.size).toBe(1);
    expect(result.value.users.get("alice")?.passwordHash).toBe("h2");
  });

  it("should read __proto__ as an ordinary username", () => {
    const result = parseUsersDocument(
      "users:\n  __proto__:\n    displayname: Proto\n    password: h\n    email: p@example.com\n",
      TARGET
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect([...result.value.users.keys()]).toEqual(["__proto__"]);
    expect(result.value.users.get("__proto__")?.email).toBe("p@example.com");
  });
});

describe("serializeUsersDocument", () => {
  it("should write the Authelia file layout", () => {
    const document: TargetDocument = {
      users: new Map([
        [
          "alice",
          {
            displayName: "Alice",
            passwordHash: "$argon2id$v=19$m=65536,t=3,p=4$c2FsdA$aGFzaA",
            email: "alice@example.com",
            groups: ["plex_users"],
            attributes: { disabled: false },
          },
        ],
      ]),
      unmanaged: new Map(),
      extra: { notes: "kept" },
    };

    const text = serializeUsersDocument(document);

    expect(parse(text)).toEqual({
      users: {
        alice: {
          displayname: "Alice",
          password: "$argon2id$v=19$m=65536,t=3,p=4$c2FsdA$aGFzaA",
          email: "alice@example.com",
          groups: ["plex_users"],
          disabled: false,
        },
      },
      notes: "kept",
    });
    expect(text.startsWith("users:\n  alice:\n    displayname: Alice\n")).toBe(true);
  });

  it("should read back what it wrote", () => {
    const parsed = parseUsersDocument(SAMPLE, TARGET);
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;

    const again = parseUsersDocument(serializeUsersDocument(parsed.value), TARGET);

    expect(again).toEqual(parsed);
  });

  it("should write __proto__ as a username", () => {
    const document: TargetDocument = {
      users: new Map([
        [
          "__proto__",
          {
            displayName: "Proto",
            passwordHash: "h",
            email: "p@example.com",
            groups: ["plex_users"],
            attributes: {},
          },
        ],
      ]),
      unmanaged: new Map(),
      extra: {},
    };

    const text = serializeUsersDocument(document);

    expect(text).toBe(
      "users:\n  __proto__:\n    displayname: Proto\n    password: h\n    email: p@example.com\n    groups:\n      - plex_users\n"
    );
    const again = parseUsersDocument(text, TARGET);
    expect(again).toEqual({ ok: true, value: document });
  });

  it("should write unreadable entries back unchanged", () => {
    const text =
      "users:\n  bob:\n    displayname: Bob\n    password: h\n    email: bob@example.com\n    groups: []\n  alice:\n    password: h\n    groups:\n      - admins\n";
    const parsed = parseUsersDocument(text, TARGET);
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;

    expect(parse(serializeUsersDocument(parsed.value))).toEqual({
      users: {
        bob: { displayname: "Bob", password: "h", email: "bob@example.com", groups: [] },
        alice: { password: "h", groups: ["admins"] },
      },
    });
  });
});
