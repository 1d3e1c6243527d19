/**
 * YamlTargetStore Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { YamlTargetStore } from "../impl/YamlTargetStore.js";
import { ErrorCode, PersistenceError } from "../../errors.js";
import type { TargetDocument } from "../../../types/index.js";

function sampleDocument(): TargetDocument {
  return {
    users: new Map([
      [
        "alice",
        {
          displayName: "Alice",
          passwordHash: "$argon2id$v=19$m=65536,t=3,p=4$c2FsdA$aGFzaA",
          email: "alice@example.com",
          groups: ["plex_users"],
          attributes: {},
        },
      ],
    ]),
    unmanaged: new Map(),
    extra: {},
  };
}

describe("YamlTargetStore", () => {
  let tempDir: string;
  let filePath: string;
  let store: YamlTargetStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "target-store-test-"));
    filePath = path.join(tempDir, "users_database.yml");
    store = new YamlTargetStore(filePath);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should report a missing file as an empty document", async () => {
    const result = await store.load();

    expect(result.state).toBe("missing");
    expect(result.document.users.size).toBe(0);
  });

  it("should report a malformed file as an empty document", async () => {
    await fs.writeFile(filePath, "users: [unclosed");

    const result = await store.load();

    expect(result.state).toBe("malformed");
    expect(result.document.users.size).toBe(0);
    if (result.state === "malformed") {
      expect(result.error.code).toBe(ErrorCode.TARGET_MALFORMED);
    }
  });

  it("should report a file it cannot read as unreadable", async () => {
    await fs.mkdir(filePath);

    const result = await store.load();

    expect(result.state).toBe("unreadable");
    if (result.state === "unreadable") {
      expect(result.error.code).toBe(ErrorCode.TARGET_UNREADABLE);
    }
  });

  it("should load what it saved", async () => {
    await store.save(sampleDocument());

    const result = await store.load();

    expect(result.state).toBe("loaded");
    expect(result.document).toEqual(sampleDocument());
  });

  it("should leave no temporary files behind", async () => {
    await store.save(sampleDocument());
    await store.save(sampleDocument());

    await expect(fs.readdir(tempDir)).resolves.toEqual(["users_database.yml"]);
  });

  it("should create missing parent directories", async () => {
    const nested = new YamlTargetStore(path.join(tempDir, "config", "users_database.yml"));

    await nested.save(sampleDocument());

    const result = await nested.load();
    expect(result.state).toBe("loaded");
  });

  it("should raise PersistenceError when the file cannot be written", async () => {
    const blocker = path.join(tempDir, "not-a-directory");
    await fs.writeFile(blocker, "");
    const blocked = new YamlTargetStore(path.join(blocker, "users_database.yml"));

    await expect(blocked.save(sampleDocument())).rejects.toBeInstanceOf(PersistenceError);
  });

  it("should copy the current file aside on backup", async () => {
    await fs.writeFile(filePath, "users: [unclosed");

    const backupPath = await store.backup();

    expect(backupPath).not.toBeNull();
    expect(path.basename(backupPath ?? "")).toMatch(/^users_database\.yml\.corrupt-/);
    await expect(fs.readFile(backupPath ?? "", "utf-8")).resolves.toBe("users: [unclosed");
  });

  it("should skip the backup when there is no file", async () => {
    await expect(store.backup()).resolves.toBeNull();
  });
});
