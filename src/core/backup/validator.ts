/**
 * Pre-start validation of a backup config
 */

import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupConfig } from "../../types";
import { isPathWithinDir } from "../../utils/path";
import { errorMessage, hasErrorCode, InvalidConfigError } from "../errors";

export const DEFAULT_COMPRESSION = 6;

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return null;
    }
    throw new InvalidConfigError(`Cannot access ${target}: ${errorMessage(error)}`);
  }
}

/**
 * Validate a config before any pass is scheduled and return it with
 * absolute paths and defaults filled in. Creates the backup root when it
 * does not exist yet.
 */
export async function validateBackupConfig(config: BackupConfig): Promise<BackupConfig> {
  const { intervalMinutes, compression = DEFAULT_COMPRESSION } = config;

  if (!Number.isInteger(intervalMinutes) || intervalMinutes <= 0) {
    throw new InvalidConfigError(
      `intervalMinutes must be a positive integer, got ${String(intervalMinutes)}`,
    );
  }

  if (!Number.isInteger(compression) || compression < 0 || compression > 9) {
    throw new InvalidConfigError(
      `compression must be an integer from 0 to 9, got ${String(compression)}`,
    );
  }

  if (!config.sourceRoot || !config.sourceRoot.trim()) {
    throw new InvalidConfigError("sourceRoot must be a non-empty path");
  }
  if (!config.backupRoot || !config.backupRoot.trim()) {
    throw new InvalidConfigError("backupRoot must be a non-empty path");
  }

  const sourceRoot = path.resolve(config.sourceRoot);
  const backupRoot = path.resolve(config.backupRoot);

  const sourceStats = await statOrNull(sourceRoot);
  if (!sourceStats || !sourceStats.isDirectory()) {
    throw new InvalidConfigError(
      `Source directory does not exist or is not a directory: ${sourceRoot}`,
    );
  }

  // Archives written inside the source would be picked up by the next pass
  if (isPathWithinDir(backupRoot, sourceRoot)) {
    throw new InvalidConfigError(
      `backupRoot must not be inside sourceRoot: ${backupRoot}`,
    );
  }

  const backupStats = await statOrNull(backupRoot);
  if (backupStats && !backupStats.isDirectory()) {
    throw new InvalidConfigError(`Backup directory is not a directory: ${backupRoot}`);
  }
  if (!backupStats) {
    try {
      await fs.mkdir(backupRoot, { recursive: true });
    } catch (error) {
      throw new InvalidConfigError(
        `Cannot create backup directory ${backupRoot}: ${errorMessage(error)}`,
      );
    }
  }

  return { sourceRoot, backupRoot, intervalMinutes, compression };
}
