/**
 * Argon2id Credential Generator
 */

import { randomBytes } from "node:crypto";
import * as argon2 from "argon2";
import type { Argon2Parameters, ICredentialGenerator } from "../interfaces/ICredentials.js";
import { DEFAULT_ARGON2_PARAMETERS } from "../interfaces/ICredentials.js";
import { DEFAULT_SECRET_LENGTH, generateSecret } from "../secrets.js";
import { HashingError, errorMessage } from "../../errors.js";

export interface Argon2CredentialGeneratorOptions {
  /** Length used when generateSecret is called without one */
  secretLength?: number;
  parameters?: Partial<Argon2Parameters>;
}

export class Argon2CredentialGenerator implements ICredentialGenerator {
  readonly parameters: Argon2Parameters;
  private readonly secretLength: number;

  constructor(options: Argon2CredentialGeneratorOptions = {}) {
    this.parameters = { ...DEFAULT_ARGON2_PARAMETERS, ...options.parameters };
    this.secretLength = options.secretLength ?? DEFAULT_SECRET_LENGTH;
  }

  generateSecret(length: number = this.secretLength): string {
    return generateSecret(length);
  }

  async hashSecret(plaintext: string): Promise<string> {
    const { memoryCost, timeCost, parallelism, hashLength, saltLength } = this.parameters;
    try {
      return await argon2.hash(plaintext, {
        type: argon2.argon2id,
        memoryCost,
        timeCost,
        parallelism,
        hashLength,
        salt: randomBytes(saltLength),
      });
    } catch (error) {
      throw new HashingError(`Argon2id hashing failed: ${errorMessage(error)}`, {
        memoryCost,
        timeCost,
        parallelism,
      });
    }
  }

  async verifySecret(hash: string, plaintext: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, plaintext);
    } catch (error) {
      throw new HashingError(`Argon2id verification failed: ${errorMessage(error)}`);
    }
  }
}
