/**
 * Archive extraction
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import AdmZip from "adm-zip";
import type { LogSink, RestoreResult } from "../../types";
import { logger } from "../../utils/logger";
import { isPathWithinDir } from "../../utils/path";
import { errorMessage, RestoreFailureError } from "../errors";

/**
 * Map an entry name to its target path under destinationDir.
 * Throws for absolute names and for names that climb out of the destination.
 * A backslash is a separator on Windows and a plain name character elsewhere.
 */
export function resolveEntryPath(destinationDir: string, entryName: string): string {
  const normalized = path.sep === "\\" ? entryName.replace(/\\/g, "/") : entryName;

  if (normalized.length === 0) {
    throw new Error("Entry has an empty name");
  }

  if (normalized.startsWith("/") || /^[a-zA-Z]:/.test(normalized)) {
    throw new Error(`Entry "${entryName}" has an absolute path`);
  }

  const destination = path.resolve(destinationDir);
  const target = path.resolve(destination, ...normalized.split("/"));

  if (!isPathWithinDir(target, destination)) {
    throw new Error(`Entry "${entryName}" resolves outside ${destination}`);
  }

  return target;
}

async function openArchive(archivePath: string): Promise<AdmZip> {
  const stats = await fs.stat(archivePath);
  if (!stats.isFile()) {
    throw new Error(`Archive is not a file: ${archivePath}`);
  }

  return new AdmZip(await fs.readFile(archivePath));
}

/**
 * Extract every entry of archivePath into destinationDir, in stored order,
 * overwriting existing files. Stops at the first entry that fails; entries
 * written before it stay on disk.
 */
export async function restoreArchive(
  archivePath: string,
  destinationDir: string,
  onLog: LogSink,
): Promise<RestoreResult> {
  const startTime = Date.now();
  const source = path.resolve(archivePath);
  const destination = path.resolve(destinationDir);
  const files: string[] = [];

  logger.debug(`Restoring ${source} into ${destination}`);

  try {
    const zip = await openArchive(source);
    await fs.mkdir(destination, { recursive: true });

    for (const entry of zip.getEntries()) {
      const target = resolveEntryPath(destination, entry.entryName);

      if (entry.isDirectory) {
        await fs.mkdir(target, { recursive: true });
        continue;
      }

      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, entry.getData());

      files.push(entry.entryName);
      onLog(`Restored file: ${target}`);
    }
  } catch (error) {
    const failure = new RestoreFailureError(
      `Restore failed after ${files.length} file(s): ${errorMessage(error)}`,
      source,
      files.length,
      { cause: error },
    );
    onLog(failure.message);
    throw failure;
  }

  onLog(`Restore complete: ${files.length} file(s) into ${destination}`);

  return {
    archivePath: source,
    destinationDir: destination,
    files,
    durationMs: Date.now() - startTime,
  };
}
