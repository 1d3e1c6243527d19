/**
 * Identity Validator
 *
 * Format rules a source user must pass before it may become a login.
 * Usernames end up as YAML mapping keys, so the character set is kept
 * to what needs no quoting.
 */

import { z } from "zod";

export const USERNAME_PATTERN = /^[A-Za-z0-9._-]{3,32}$/;

export const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

export const UsernameSchema = z
  .string()
  .regex(USERNAME_PATTERN, "Username must be 3-32 characters of letters, digits, '.', '_' or '-'");

export const EmailSchema = z
  .string()
  .regex(EMAIL_PATTERN, "Email must look like local@domain.tld");

export function validateUsername(username: string): boolean {
  return UsernameSchema.safeParse(username).success;
}

export function validateEmail(email: string): boolean {
  return EmailSchema.safeParse(email).success;
}

/**
 * Why a source user cannot be admitted, or null when it can
 */
export type IdentityRejection = "invalid-username" | "invalid-email";

export function checkIdentity(user: { username: string; email: string }): IdentityRejection | null {
  if (!validateUsername(user.username)) return "invalid-username";
  if (!validateEmail(user.email)) return "invalid-email";
  return null;
}
