/**
 * File System Utilities
 * Whole-file reads and writes for the stores this tool keeps in step
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fsPromises.mkdir(dirPath, { recursive: true });
  } catch (error) {
    // Directory already exists
    if (!isErrnoException(error) || error.code !== "EEXIST") {
      throw error;
    }
  }
}

/**
 * Read a file as text. Defaults to UTF-8
 */
export async function readFileWithEncoding(
  filePath: string,
  encoding: BufferEncoding = "utf-8"
): Promise<string> {
  return fsPromises.readFile(filePath, { encoding });
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether new files can be created inside `dirPath`
 */
export function isWritableDirectory(dirPath: string): boolean {
  try {
    fs.accessSync(dirPath, fs.constants.W_OK);
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Replace a file's content in one step.
 *
 * The content goes to a temporary sibling first and is renamed over the
 * target, so readers see either the old file or the new one.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDirectory(dir);

  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${crypto.randomBytes(6).toString("hex")}.tmp`
  );

  try {
    await fsPromises.writeFile(tempPath, content);
    await fsPromises.rename(tempPath, filePath);
  } catch (error) {
    await fsPromises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Narrow an unknown throwable to a Node.js system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
