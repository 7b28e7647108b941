/**
 * Centralized type exports for zipshot
 */

// Backup types
export type {
  ArchiveResult,
  FileCandidate,
  LogSink,
  PassOutcome,
  RestoreResult,
  ServiceStatus,
  Watermark,
} from "./backup";
// Config types
export type { ArchiveConfig, BackupConfig, ZipshotConfig } from "./config";
