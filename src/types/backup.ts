/**
 * Backup and restore type definitions
 */

import type { PassFailureError } from "../core/errors";
import type { BackupConfig } from "./config";

/**
 * One-way progress notification sink
 */
export type LogSink = (message: string) => void;

/**
 * Watermark of a session; null means no pass has completed yet
 */
export type Watermark = Date | null;

export interface FileCandidate {
  absolutePath: string;
  /** Path relative to the source root, always with forward slashes */
  relativePath: string;
  modifiedAt: Date;
  size: number;
}

export interface ArchiveResult {
  archivePath: string;
  archiveName: string;
  sizeBytes: number;
  filesCount: number;
  entries: string[];
}

export type PassOutcome =
  | { status: "archived"; startedAt: Date; durationMs: number; archive: ArchiveResult }
  | { status: "empty"; startedAt: Date; durationMs: number }
  | { status: "failed"; startedAt: Date; durationMs: number; error: PassFailureError };

export interface RestoreResult {
  archivePath: string;
  destinationDir: string;
  /** Restored entry names, in archive order */
  files: string[];
  durationMs: number;
}

export interface ServiceStatus {
  running: boolean;
  config: Readonly<BackupConfig> | null;
  lastBackupTime: Watermark;
  lastPass: PassOutcome | null;
}
