/**
 * Write the finished document to disk
 *
 * The document goes to a temporary sibling first and is renamed into place,
 * so the target path only ever holds a complete file.
 */

import { rmSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { IOError } from "./errors.js";

/** Temporary files of writes that have not finished yet */
const pendingTempPaths = new Set<string>();

export interface WrittenDocument {
  path: string;
  /** Size of the written file in bytes */
  bytes: number;
}

/**
 * Write content to `filePath`, creating parent directories as needed.
 *
 * @throws {IOError} If the directory, temporary file, or rename fails
 */
export async function writeDocument(filePath: string, content: string): Promise<WrittenDocument> {
  const tempPath = `${filePath}.tmp`;
  pendingTempPaths.add(tempPath);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, "utf-8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => {
      // The write error below is the one worth reporting
    });
    const message = error instanceof Error ? error.message : String(error);
    throw new IOError(`Could not write output: ${message}`, filePath, { cause: error });
  } finally {
    pendingTempPaths.delete(tempPath);
  }

  return { path: filePath, bytes: Buffer.byteLength(content, "utf-8") };
}

/**
 * Temporary paths of the writes still in progress.
 */
export function pendingWrites(): string[] {
  return [...pendingTempPaths];
}

/**
 * Remove the temporary files of unfinished writes.
 * Synchronous, so it can run from a signal handler right before exit.
 */
export function discardPendingWrites(): void {
  for (const tempPath of pendingTempPaths) {
    rmSync(tempPath, { force: true });
  }
  pendingTempPaths.clear();
}
