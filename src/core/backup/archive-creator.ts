/**
 * Zip archive creation for backup passes
 */

import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import archiver from "archiver";
import type { ArchiveResult, FileCandidate } from "../../types";
import { logger } from "../../utils/logger";
import { hasErrorCode } from "../errors";
import { DEFAULT_COMPRESSION } from "./validator";

/**
 * archiver rewrites entry names: backslashes become "/" and a leading
 * "word:" is dropped. A relative path it would rewrite cannot be stored
 * under its own name.
 */
export function isStorableEntryName(relativePath: string): boolean {
  return !relativePath.includes("\\") && !/^\w+:/.test(relativePath);
}

function writeZip(files: FileCandidate[], archivePath: string, compression: number): Promise<number> {
  return new Promise((resolve, reject) => {
    // wx: an archive that already exists is never overwritten
    const output = createWriteStream(archivePath, { flags: "wx" });
    // statConcurrency 1 keeps entries in the order they were added
    const archive = archiver("zip", { zlib: { level: compression }, statConcurrency: 1 });
    let failure: Error | null = null;

    const fail = (error: Error) => {
      if (failure) return;
      failure = error;
      archive.abort();
      output.destroy();
    };

    // Settle only after the file handle is closed so cleanup cannot race the open
    output.on("close", () => {
      if (failure) {
        reject(failure);
      } else {
        resolve(archive.pointer());
      }
    });
    output.on("error", fail);
    archive.on("error", fail);
    archive.on("warning", fail);

    archive.pipe(output);

    for (const file of files) {
      archive.file(file.absolutePath, { name: file.relativePath });
    }

    archive.finalize().catch(fail);
  });
}

export async function createArchive(
  files: FileCandidate[],
  archivePath: string,
  compression: number = DEFAULT_COMPRESSION,
): Promise<ArchiveResult> {
  if (files.length === 0) {
    throw new Error("No files to archive");
  }

  const unstorable = files.filter((f) => !isStorableEntryName(f.relativePath)).map((f) => f.relativePath);
  if (unstorable.length > 0) {
    throw new Error(`Cannot store under their own names in a zip archive: ${unstorable.join(", ")}`);
  }

  const archiveName = path.basename(archivePath);
  logger.debug(`Writing ${files.length} entries to ${archiveName} (level ${compression})`);

  try {
    const sizeBytes = await writeZip(files, archivePath, compression);

    return {
      archivePath,
      archiveName,
      sizeBytes,
      filesCount: files.length,
      entries: files.map((f) => f.relativePath),
    };
  } catch (error) {
    // EEXIST means the file belongs to an earlier pass; anything else left it half written
    if (!hasErrorCode(error, "EEXIST")) {
      await fs.rm(archivePath, { force: true });
      logger.debug(`Removed incomplete archive: ${archivePath}`);
    }
    throw error;
  }
}
