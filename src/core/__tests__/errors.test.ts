/**
 * Error hierarchy tests
 */

import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  ErrorCode,
  ReloadError,
  SyncError,
  errorMessage,
  isSyncError,
} from "../errors.js";

describe("SyncError", () => {
  it("should carry its code into toString", () => {
    const error = new ConfigurationError("Invalid configuration: SYNC_INTERVAL: bad", [
      "SYNC_INTERVAL: bad",
    ]);

    expect(error.toString()).toBe(
      "[E1000] ConfigurationError: Invalid configuration: SYNC_INTERVAL: bad"
    );
    expect(error).toBeInstanceOf(SyncError);
  });

  it("should serialize for structured logs", () => {
    const error = new ReloadError("Error restarting Authelia container", ErrorCode.RELOAD_TIMEOUT, {
      target: "authelia",
      reason: "no response within 30000ms",
    });

    expect(error.toJSON()).toMatchObject({
      name: "ReloadError",
      code: "E5001",
      context: { target: "authelia", reason: "no response within 30000ms" },
    });
  });
});

describe("isSyncError", () => {
  it("should recognise every subclass and nothing else", () => {
    expect(isSyncError(new SyncError("boom", ErrorCode.HASHING_FAILED))).toBe(true);
    expect(isSyncError(new ConfigurationError("bad"))).toBe(true);
    expect(isSyncError(new Error("boom"))).toBe(false);
    expect(isSyncError("boom")).toBe(false);
  });
});

describe("errorMessage", () => {
  it.each([
    [new Error("boom"), "boom"],
    ["boom", "boom"],
    [42, "42"],
  ])("should describe %s", (input, expected) => {
    expect(errorMessage(input)).toBe(expected);
  });
});
