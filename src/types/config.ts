/**
 * Configuration type definitions for zipshot
 */

/**
 * Settings for one backup session. Frozen once the session starts.
 */
export interface BackupConfig {
  /** Directory tree to back up */
  sourceRoot: string;
  /** Directory the timestamped archives are written to */
  backupRoot: string;
  /** Minutes between passes; positive integer */
  intervalMinutes: number;
  /** zlib level for archive entries, 0-9 (default: 6) */
  compression?: number;
}

export interface ArchiveConfig {
  compression?: number;
}

/**
 * Shape of zipshot.config.yaml / .json
 */
export interface ZipshotConfig {
  version: string;
  sourceRoot: string;
  backupRoot: string;
  intervalMinutes: number;
  archive?: ArchiveConfig;
}
