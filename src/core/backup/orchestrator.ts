/**
 * Backup pass orchestration
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { LogSink, PassOutcome } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { formatLogTimestamp, generateArchiveName } from "../../utils/naming";
import { errorMessage, PassFailureError } from "../errors";
import { createArchive } from "./archive-creator";
import { scanSource } from "./file-collector";
import type { BackupSession } from "./session";

async function executePass(session: BackupSession, startedAt: Date, onLog: LogSink): Promise<PassOutcome> {
  const startTime = Date.now();
  const { sourceRoot, backupRoot, compression } = session.config;

  const candidates = await scanSource(sourceRoot, session.lastBackupTime);

  if (candidates.length === 0) {
    onLog("No new or modified files to back up");
    session.advanceWatermark(startedAt);
    return { status: "empty", startedAt, durationMs: Date.now() - startTime };
  }

  await fs.mkdir(backupRoot, { recursive: true });
  const archivePath = path.join(backupRoot, generateArchiveName(startedAt));
  const archive = await createArchive(candidates, archivePath, compression);

  // Only a fully written archive moves the watermark
  session.advanceWatermark(startedAt);

  return { status: "archived", startedAt, durationMs: Date.now() - startTime, archive };
}

/**
 * Run one scan-and-archive pass. Never throws: I/O failures come back as a
 * "failed" outcome and leave the watermark where it was.
 */
export async function runBackupPass(session: BackupSession, onLog: LogSink): Promise<PassOutcome> {
  const startedAt = session.now();
  const startTime = Date.now();
  onLog(`Scanning ${session.config.sourceRoot} at ${formatLogTimestamp(startedAt)}`);

  let outcome: PassOutcome;
  try {
    outcome = await executePass(session, startedAt, onLog);
  } catch (error) {
    const failure = new PassFailureError(`Backup failed: ${errorMessage(error)}`, startedAt, {
      cause: error,
    });
    logger.debug("Backup pass error", error);
    onLog(failure.message);
    return { status: "failed", startedAt, durationMs: Date.now() - startTime, error: failure };
  }

  if (outcome.status === "archived") {
    const { archive } = outcome;
    onLog(
      `Backup created: ${archive.archivePath} (${archive.filesCount} files, ${formatBytes(archive.sizeBytes)}, ${formatDuration(outcome.durationMs)})`,
    );
  }

  return outcome;
}
