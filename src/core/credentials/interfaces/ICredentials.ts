/**
 * Credential Interfaces
 *
 * Contracts for producing new logins and for handing their plaintext
 * secrets to an administrator.
 */

// =============================================================================
// Generation & Hashing
// =============================================================================

/**
 * Argon2id cost parameters
 */
export interface Argon2Parameters {
  /** Memory cost in KiB */
  memoryCost: number;
  timeCost: number;
  parallelism: number;
  /** Digest length in bytes */
  hashLength: number;
  /** Salt length in bytes */
  saltLength: number;
}

/**
 * Parameters Authelia's default argon2 profile verifies without rehashing
 */
export const DEFAULT_ARGON2_PARAMETERS: Argon2Parameters = {
  memoryCost: 65536,
  timeCost: 3,
  parallelism: 4,
  hashLength: 32,
  saltLength: 16,
};

export interface ICredentialGenerator {
  /**
   * Draw a random secret. Lengths below the minimum are raised to it.
   */
  generateSecret(length?: number): string;

  /**
   * Hash a plaintext secret into a self-describing PHC string.
   *
   * @throws HashingError when the primitive fails
   */
  hashSecret(plaintext: string): Promise<string>;

  /**
   * Check a plaintext secret against a stored hash
   */
  verifySecret(hash: string, plaintext: string): Promise<boolean>;
}

// =============================================================================
// Delivery
// =============================================================================

export type CredentialDelivery =
  | { delivered: true; destination: string }
  | { delivered: false; reason: "unavailable" | "dry-run" | "write-failed" };

/**
 * Out-of-band sink for newly issued plaintext secrets.
 *
 * Kept apart from operational logs; those only ever see an obfuscated form.
 */
export interface ICredentialChannel {
  readonly kind: "secure-log" | "unavailable" | "dry-run";

  deliver(username: string, secret: string): Promise<CredentialDelivery>;

  close(): void;
}
