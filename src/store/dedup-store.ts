/**
 * @module store/dedup-store
 * @fileoverview Load URLs already captured by earlier runs.
 *
 * Every artifact is a JSON array of {@link DetailRecord}-shaped objects. The
 * union of their `url` fields is the SeenSet: threads in it are neither
 * fetched nor emitted again. A cold start (no directory yet) simply sees
 * nothing.
 *
 * ```
 *   data/
 *     answered_forum_2025-01-06.json   -> urls A, B, C
 *     answered_forum_2025-01-13.json   -> urls C, D
 *                                       => SeenSet { A, B, C, D }
 * ```
 */

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { formatError } from "../utils/errors.js";
import { log } from "../utils/log.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export const DetailRecordSchema = z.object({
  title: z.string(),
  url: z.string(),
  question: z.string(),
  answer: z.string(),
});

/** One extracted thread. The unit of the output artifact. */
export type DetailRecord = z.infer<typeof DetailRecordSchema>;

/** URLs already present in a persisted artifact. */
export type SeenSet = ReadonlySet<string>;

const ArtifactEntrySchema = z.object({ url: z.string().min(1) });

export interface LoadSeenSetOptions {
  /** Artifact paths to leave out, typically the run's own output file. */
  exclude?: string[];
}

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function isMissingPath(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, "utf8"));
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Build the SeenSet from every `*.json` artifact in `directory`.
 *
 * - A missing directory, or a path that is not a directory, gives an empty
 *   set.
 * - Files that cannot be read or are not a JSON array are logged and
 *   skipped.
 * - Entries without a non-empty string `url` are ignored.
 */
export async function loadSeenSet(
  directory: string,
  options: LoadSeenSetOptions = {},
): Promise<SeenSet> {
  const seen = new Set<string>();
  const excluded = new Set((options.exclude ?? []).map((file) => path.resolve(file)));

  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    if (isMissingPath(error)) {
      log.info("dedup-store", "no prior artifacts directory, starting fresh", { directory });
      return seen;
    }
    throw error;
  }

  let files = 0;
  for (const name of names.filter((entry) => entry.endsWith(".json")).sort()) {
    const filePath = path.join(directory, name);
    if (excluded.has(path.resolve(filePath))) {
      continue;
    }

    let data: unknown;
    try {
      data = await readJson(filePath);
    } catch (error) {
      log.warn("dedup-store", "skipping unreadable artifact", {
        file: filePath,
        cause: formatError(error),
      });
      continue;
    }

    if (!Array.isArray(data)) {
      log.warn("dedup-store", "skipping artifact that is not a JSON array", { file: filePath });
      continue;
    }

    for (const entry of data) {
      const parsed = ArtifactEntrySchema.safeParse(entry);
      if (parsed.success) {
        seen.add(parsed.data.url);
      }
    }
    files += 1;
  }

  log.info("dedup-store", "loaded prior artifacts", { directory, files, urls: seen.size });
  return seen;
}

/**
 * Read one artifact's records, e.g. the partial output of an interrupted
 * run. Returns `null` when the file does not exist.
 *
 * Entries that are not complete {@link DetailRecord}s are dropped.
 *
 * @throws {SyntaxError} If the file is not valid JSON.
 * @throws {Error} If the file is valid JSON but not an array.
 */
export async function readArtifact(filePath: string): Promise<DetailRecord[] | null> {
  let data: unknown;
  try {
    data = await readJson(filePath);
  } catch (error) {
    if (isMissingPath(error)) {
      return null;
    }
    throw error;
  }

  if (!Array.isArray(data)) {
    throw new Error(`Artifact ${filePath} is not a JSON array`);
  }

  const records: DetailRecord[] = [];
  for (const entry of data) {
    const parsed = DetailRecordSchema.safeParse(entry);
    if (parsed.success) {
      records.push(parsed.data);
    }
  }
  return records;
}
