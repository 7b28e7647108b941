/**
 * Backup module exports
 */

export { createArchive, isStorableEntryName } from "./archive-creator";
export { isModifiedSince, scanSource } from "./file-collector";
export { runBackupPass } from "./orchestrator";
export { BackupSession, type Clock } from "./session";
export { DEFAULT_COMPRESSION, validateBackupConfig } from "./validator";
