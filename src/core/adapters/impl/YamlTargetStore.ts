/**
 * Authelia users file store
 */

import * as fsPromises from "node:fs/promises";
import type { TargetDocument } from "../../../types/index.js";
import type { ITargetStore, TargetLoadResult } from "../interfaces/IAdapters.js";
import { ErrorCode, PersistenceError, TargetStoreError, errorMessage } from "../../errors.js";
import { emptyDocument, parseUsersDocument, serializeUsersDocument } from "./users-document.js";
import {
  createLogger,
  fileExists,
  readFileWithEncoding,
  writeFileAtomic,
  type Logger,
} from "../../../utils/index.js";

export class YamlTargetStore implements ITargetStore {
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("authelia-store");
  }

  get location(): string {
    return this.filePath;
  }

  async load(): Promise<TargetLoadResult> {
    if (!(await fileExists(this.filePath))) {
      return { state: "missing", document: emptyDocument() };
    }

    let text: string;
    try {
      text = await readFileWithEncoding(this.filePath);
    } catch (error) {
      return {
        state: "unreadable",
        document: emptyDocument(),
        error: new TargetStoreError(
          `Error reading Authelia users file: ${errorMessage(error)}`,
          ErrorCode.TARGET_UNREADABLE,
          { targetPath: this.filePath }
        ),
      };
    }

    const parsed = parseUsersDocument(text, this.filePath);
    if (!parsed.ok) {
      return { state: "malformed", document: emptyDocument(), error: parsed.error };
    }

    this.logger.debug({ count: parsed.value.users.size }, "Loaded Authelia users");
    return { state: "loaded", document: parsed.value };
  }

  async save(document: TargetDocument): Promise<void> {
    try {
      await writeFileAtomic(this.filePath, serializeUsersDocument(document));
    } catch (error) {
      throw new PersistenceError(`Error saving Authelia users file: ${errorMessage(error)}`, {
        targetPath: this.filePath,
      });
    }
    this.logger.info({ file: this.filePath, count: document.users.size }, "Updated Authelia users file");
  }

  async backup(): Promise<string | null> {
    if (!(await fileExists(this.filePath))) {
      return null;
    }

    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const backupPath = `${this.filePath}.corrupt-${stamp}`;
    try {
      await fsPromises.copyFile(this.filePath, backupPath);
    } catch (error) {
      throw new PersistenceError(`Error backing up Authelia users file: ${errorMessage(error)}`, {
        targetPath: this.filePath,
        backupPath,
      });
    }
    this.logger.warn({ file: this.filePath, backup: backupPath }, "Backed up unreadable users file");
    return backupPath;
  }
}
