/**
 * Core module exports
 */

// Backup
export {
  BackupSession,
  type Clock,
  createArchive,
  DEFAULT_COMPRESSION,
  isModifiedSince,
  isStorableEntryName,
  runBackupPass,
  scanSource,
  validateBackupConfig,
} from "./backup";

// Errors
export {
  AlreadyRunningError,
  errorMessage,
  InvalidConfigError,
  PassFailureError,
  RestoreFailureError,
} from "./errors";

// Restore
export { type ArchiveListing, listArchives, resolveEntryPath, restoreArchive } from "./restore";

// Scheduler
export { Scheduler, type SchedulerOptions } from "./scheduler";

// Service
export { BackupService, type BackupServiceOptions } from "./service";

// Types
export type {
  ArchiveResult,
  BackupConfig,
  FileCandidate,
  LogSink,
  PassOutcome,
  RestoreResult,
  ServiceStatus,
  Watermark,
} from "../types";
