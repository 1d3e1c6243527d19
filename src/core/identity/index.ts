/**
 * Identity Module
 *
 * Username and email format rules.
 */

export * from "./validator.js";
