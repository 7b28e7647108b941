/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { BackupConfig, ZipshotConfig } from "../types";

/**
 * Resolve relative paths in config against the config file's directory
 */
export function resolvePaths(config: ZipshotConfig, configPath: string): ZipshotConfig {
  const configDir = path.dirname(path.resolve(configPath));

  return {
    ...config,
    sourceRoot: path.resolve(configDir, config.sourceRoot),
    backupRoot: path.resolve(configDir, config.backupRoot),
  };
}

/**
 * The subset of a loaded config a backup session runs on
 */
export function toBackupConfig(config: ZipshotConfig): BackupConfig {
  return {
    sourceRoot: config.sourceRoot,
    backupRoot: config.backupRoot,
    intervalMinutes: config.intervalMinutes,
    ...(config.archive?.compression !== undefined && { compression: config.archive.compression }),
  };
}
