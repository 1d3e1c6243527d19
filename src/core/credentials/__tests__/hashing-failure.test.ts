/**
 * Argon2 failure handling
 */

import { describe, it, expect, vi } from "vitest";

vi.mock("argon2", () => ({
  argon2id: 2,
  hash: vi.fn().mockRejectedValue(new Error("Memory allocation error")),
  verify: vi.fn().mockRejectedValue(new Error("pchstr must contain a $ as first char")),
}));

import { Argon2CredentialGenerator } from "../impl/Argon2CredentialGenerator.js";
import { ErrorCode, HashingError } from "../../errors.js";

describe("Argon2CredentialGenerator failures", () => {
  it("should surface a primitive failure as HashingError", async () => {
    const generator = new Argon2CredentialGenerator();

    const failure = await generator.hashSecret("test-secret").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HashingError);
    expect(failure).toMatchObject({
      code: ErrorCode.HASHING_FAILED,
      message: "Argon2id hashing failed: Memory allocation error",
    });
  });

  it("should surface a verification failure as HashingError", async () => {
    const generator = new Argon2CredentialGenerator();

    await expect(generator.verifySecret("not-a-hash", "test-secret")).rejects.toBeInstanceOf(
      HashingError
    );
  });
});
