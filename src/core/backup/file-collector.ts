/**
 * Source tree scanning for incremental passes
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { FileCandidate, Watermark } from "../../types";
import { logger } from "../../utils/logger";
import { toPosixPath } from "../../utils/path";

/**
 * A file qualifies when nothing has been backed up yet, or when it was
 * modified strictly after the watermark.
 */
export function isModifiedSince(modifiedMs: number, watermark: Watermark): boolean {
  return watermark === null || modifiedMs > watermark.getTime();
}

/**
 * Depth-first walk yielding regular files only. Symlinks are neither
 * followed nor yielded; sockets, FIFOs and devices are skipped.
 */
async function* walkFiles(dir: string): AsyncGenerator<string> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      yield* walkFiles(entryPath);
    } else if (entry.isFile()) {
      yield entryPath;
    }
  }
}

export async function scanSource(sourceRoot: string, watermark: Watermark): Promise<FileCandidate[]> {
  const basePath = path.resolve(sourceRoot);
  const candidates: FileCandidate[] = [];
  let scanned = 0;

  for await (const absolutePath of walkFiles(basePath)) {
    scanned++;

    // lstat: the entry may have been swapped for a link since readdir
    const stats = await fs.lstat(absolutePath);
    if (!stats.isFile() || !isModifiedSince(stats.mtimeMs, watermark)) {
      continue;
    }

    candidates.push({
      absolutePath,
      relativePath: toPosixPath(path.relative(basePath, absolutePath)),
      modifiedAt: stats.mtime,
      size: stats.size,
    });
  }

  logger.debug(`Scanned ${scanned} files under ${basePath}, ${candidates.length} new or modified`);

  return candidates;
}
