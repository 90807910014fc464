/**
 * @module store/artifact-writer
 * @fileoverview Persist a run's records as one JSON artifact.
 *
 * The artifact is written to `<path>.tmp` and renamed over the target, so a
 * crash mid-write leaves the previous checkpoint intact. Format: UTF-8 JSON
 * array, four-space indentation, non-ASCII characters kept as-is.
 */

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { PersistenceError, formatError } from "../utils/errors.js";
import type { DetailRecord } from "./dedup-store.js";

/**
 * Serialize records the way they appear on disk.
 */
export function serializeRecords(records: readonly DetailRecord[]): string {
  return `${JSON.stringify(records, null, 4)}\n`;
}

/**
 * Write `records` to `filePath`, replacing any previous content.
 *
 * @throws {PersistenceError} If the directory cannot be created or the file
 *   cannot be written or renamed.
 */
export async function writeArtifact(
  filePath: string,
  records: readonly DetailRecord[],
): Promise<void> {
  const tempPath = `${filePath}.tmp`;

  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(tempPath, serializeRecords(records), "utf8");
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch(() => undefined);
    throw new PersistenceError(
      `Could not write artifact ${filePath}: ${formatError(error)}`,
      filePath,
      error,
    );
  }
}
