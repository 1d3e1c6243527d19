/**
 * Credentials Module
 *
 * Secret generation, Argon2id hashing and the secure delivery channel.
 */

// Interfaces
export * from "./interfaces/ICredentials.js";

// Secrets
export * from "./secrets.js";

// Implementations
export * from "./impl/Argon2CredentialGenerator.js";
export * from "./impl/credential-channels.js";
