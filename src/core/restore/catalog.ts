/**
 * Listing of archives already written to a backup root
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parseArchiveName } from "../../utils/naming";

export interface ArchiveListing {
  archiveName: string;
  archivePath: string;
  createdAt: Date;
  sizeBytes: number;
}

/**
 * Archives in backupRoot whose names match backup_yyyyMMdd_HHmmss.zip,
 * newest first. Other files are ignored.
 */
export async function listArchives(backupRoot: string): Promise<ArchiveListing[]> {
  const root = path.resolve(backupRoot);
  const entries = await fs.readdir(root, { withFileTypes: true });
  const listings: ArchiveListing[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const parsed = parseArchiveName(entry.name);
    if (!parsed) continue;

    const archivePath = path.join(root, entry.name);
    const stats = await fs.stat(archivePath);

    listings.push({
      archiveName: entry.name,
      archivePath,
      createdAt: parsed.createdAt,
      sizeBytes: stats.size,
    });
  }

  return listings.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}
