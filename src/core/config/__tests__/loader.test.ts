/**
 * Configuration loader tests
 */

import { describe, it, expect } from "vitest";
import { describeConfig, loadConfig } from "../loader.js";
import { ConfigurationError, ErrorCode } from "../../errors.js";

describe("loadConfig", () => {
  it("should fall back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      wizarrDbPath: "/wizarr/database.db",
      autheliaUsersPath: "/authelia/users_database.yml",
      defaultGroup: "plex_users",
      dryRun: false,
      syncIntervalSeconds: 0,
      autheliaContainer: "authelia",
      restartAuthelia: true,
      reloadTimeoutSeconds: 30,
      secureLogPath: "/app/secure.log",
      passwordLength: 16,
      strictTarget: false,
      logLevel: undefined,
    });
  });

  it("should read every variable", () => {
    const config = loadConfig({
      WIZARR_DB_PATH: "/data/wizarr.db",
      AUTHELIA_USERS_PATH: "/config/users.yml",
      DEFAULT_GROUP: "media",
      DRY_RUN: "true",
      SYNC_INTERVAL: "300",
      AUTHELIA_CONTAINER: "auth",
      RESTART_AUTHELIA: "false",
      RELOAD_TIMEOUT_SECONDS: "10",
      SECURE_LOG_PATH: "/logs/secure.log",
      PASSWORD_LENGTH: "24",
      STRICT_TARGET: "true",
      LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      wizarrDbPath: "/data/wizarr.db",
      autheliaUsersPath: "/config/users.yml",
      defaultGroup: "media",
      dryRun: true,
      syncIntervalSeconds: 300,
      autheliaContainer: "auth",
      restartAuthelia: false,
      reloadTimeoutSeconds: 10,
      secureLogPath: "/logs/secure.log",
      passwordLength: 24,
      strictTarget: true,
      logLevel: "debug",
    });
  });

  it.each([
    ["true", true],
    ["TRUE", true],
    ["True", true],
    ["false", false],
    ["yes", false],
    ["1", false],
  ])("should read DRY_RUN=%s as %s", (value, expected) => {
    expect(loadConfig({ DRY_RUN: value }).dryRun).toBe(expected);
  });

  it("should treat blank variables as unset", () => {
    const config = loadConfig({ DEFAULT_GROUP: "  ", SYNC_INTERVAL: "", RESTART_AUTHELIA: " " });

    expect(config.defaultGroup).toBe("plex_users");
    expect(config.syncIntervalSeconds).toBe(0);
    expect(config.restartAuthelia).toBe(true);
  });

  it("should trim surrounding whitespace", () => {
    expect(loadConfig({ SYNC_INTERVAL: " 60 " }).syncIntervalSeconds).toBe(60);
  });

  it("should accept an upper-case log level", () => {
    expect(loadConfig({ LOG_LEVEL: "WARN" }).logLevel).toBe("warn");
  });

  it.each([
    ["SYNC_INTERVAL", "soon"],
    ["SYNC_INTERVAL", "-5"],
    ["SYNC_INTERVAL", "1.5"],
    ["RELOAD_TIMEOUT_SECONDS", "0"],
    ["PASSWORD_LENGTH", "0"],
    ["PASSWORD_LENGTH", "129"],
    ["LOG_LEVEL", "verbose"],
  ])("should reject %s=%s", (name, value) => {
    let failure: unknown;
    try {
      loadConfig({ [name]: value });
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(ConfigurationError);
    if (!(failure instanceof ConfigurationError)) return;
    expect(failure.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(failure.issues).toHaveLength(1);
    expect(failure.issues[0]?.startsWith(`${name}: `)).toBe(true);
  });

  it("should list every invalid variable", () => {
    expect(() => loadConfig({ SYNC_INTERVAL: "soon", PASSWORD_LENGTH: "0" })).toThrow(
      /SYNC_INTERVAL: .*; PASSWORD_LENGTH: /
    );
  });

  it("should let overrides win over the environment", () => {
    const config = loadConfig({ DRY_RUN: "false", SYNC_INTERVAL: "300" }, { dryRun: true, syncIntervalSeconds: 0 });

    expect(config.dryRun).toBe(true);
    expect(config.syncIntervalSeconds).toBe(0);
  });

  it("should reject a negative interval override", () => {
    expect(() => loadConfig({}, { syncIntervalSeconds: -1 })).toThrow(ConfigurationError);
  });

  it("should return a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});

describe("describeConfig", () => {
  it("should describe a single-pass configuration", () => {
    const rows = new Map(describeConfig(loadConfig({})));

    expect(rows.get("Sync Interval")).toBe("0s (run once)");
    expect(rows.get("Dry Run")).toBe("false");
    expect(rows.get("Reload Timeout")).toBe("30s");
  });

  it("should describe a periodic configuration", () => {
    const rows = new Map(describeConfig(loadConfig({ SYNC_INTERVAL: "60" })));

    expect(rows.get("Sync Interval")).toBe("60s (periodic)");
  });

  it("should list settings in a fixed order", () => {
    const labels = describeConfig(loadConfig({})).map(([label]) => label);

    expect(labels).toEqual([
      "Wizarr DB",
      "Authelia Users",
      "Default Group",
      "Dry Run",
      "Restart Authelia",
      "Authelia Container",
      "Reload Timeout",
      "Sync Interval",
      "Secure Log",
      "Password Length",
      "Strict Target",
      "Log Level",
    ]);
  });
});
