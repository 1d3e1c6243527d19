/**
 * Wizarr source adapter
 *
 * Reads invited users straight from Wizarr's SQLite database.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import type { SourceUser } from "../../../types/index.js";
import type { ISourceAdapter } from "../interfaces/IAdapters.js";
import { ErrorCode, SourceUnavailableError, errorMessage } from "../../errors.js";
import { createLogger, fileExists, type Logger } from "../../../utils/index.js";

export const SOURCE_USERS_QUERY = "SELECT username, email FROM user WHERE email IS NOT NULL";

const SourceRowSchema = z.object({
  username: z.string(),
  email: z.string(),
});

export class SqliteSourceAdapter implements ISourceAdapter {
  private readonly logger: Logger;

  constructor(
    private readonly dbPath: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("wizarr-source");
  }

  get location(): string {
    return this.dbPath;
  }

  async listUsers(): Promise<SourceUser[]> {
    if (!(await fileExists(this.dbPath))) {
      throw new SourceUnavailableError(
        `Wizarr database not found at ${this.dbPath}`,
        ErrorCode.SOURCE_UNAVAILABLE,
        { sourcePath: this.dbPath }
      );
    }

    let rows: unknown[];
    let db: Database.Database | undefined;
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
      rows = db.prepare(SOURCE_USERS_QUERY).all();
    } catch (error) {
      throw new SourceUnavailableError(
        `Error reading Wizarr database: ${errorMessage(error)}`,
        ErrorCode.SOURCE_QUERY_FAILED,
        { sourcePath: this.dbPath }
      );
    } finally {
      db?.close();
    }

    const users: SourceUser[] = [];
    for (const row of rows) {
      const parsed = SourceRowSchema.safeParse(row);
      if (parsed.success) {
        users.push(parsed.data);
      } else {
        this.logger.warn({ row }, "Ignoring Wizarr user without a text username");
      }
    }

    this.logger.info({ count: users.length }, "Found users in Wizarr");
    return users;
  }
}
