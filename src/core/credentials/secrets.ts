/**
 * Secret generation and masking
 */

import { randomInt } from "node:crypto";

export const SECRET_ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!@#$%^&*";

export const MIN_SECRET_LENGTH = 8;
export const DEFAULT_SECRET_LENGTH = 16;

/**
 * Draw `length` characters uniformly from SECRET_ALPHABET using the CSPRNG
 */
export function generateSecret(length: number = DEFAULT_SECRET_LENGTH): string {
  const size = Math.max(MIN_SECRET_LENGTH, Math.floor(length));
  let secret = "";
  for (let i = 0; i < size; i++) {
    secret += SECRET_ALPHABET.charAt(randomInt(SECRET_ALPHABET.length));
  }
  return secret;
}

/**
 * Mask a secret for general logs: first and last two characters stay
 * visible, anything of six characters or fewer is masked entirely.
 */
export function obfuscateSecret(secret: string): string {
  if (secret.length > 6) {
    return secret.slice(0, 2) + "*".repeat(secret.length - 4) + secret.slice(-2);
  }
  return "*".repeat(secret.length);
}
