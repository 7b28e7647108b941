/**
 * Backup service: the start/stop/restore surface callers drive
 */

import type { BackupConfig, LogSink, PassOutcome, RestoreResult, ServiceStatus } from "../types";
import { logger } from "../utils/logger";
import { BackupSession, type Clock } from "./backup/session";
import { runBackupPass } from "./backup/orchestrator";
import { validateBackupConfig } from "./backup/validator";
import { AlreadyRunningError } from "./errors";
import { restoreArchive } from "./restore/extractor";
import { Scheduler } from "./scheduler/daemon";

export interface BackupServiceOptions {
  /** Time source for pass start times; defaults to the system clock */
  clock?: Clock;
}

type ServiceState = "idle" | "starting" | "running";

export class BackupService {
  private state: ServiceState = "idle";
  // Bumped by every start() and stop() so a start still validating can tell it was superseded
  private generation = 0;
  private session: BackupSession | null = null;
  private scheduler: Scheduler | null = null;
  private onLog: LogSink | null = null;
  private lastPass: PassOutcome | null = null;

  constructor(private readonly options: BackupServiceOptions = {}) {}

  /**
   * Validate the config, then run a pass immediately and every
   * intervalMinutes after that. Rejects with InvalidConfigError before
   * anything is scheduled, or AlreadyRunningError when already started.
   */
  async start(config: BackupConfig, onLog: LogSink): Promise<void> {
    if (this.state !== "idle") {
      throw new AlreadyRunningError();
    }

    this.state = "starting";
    const attempt = ++this.generation;

    let validated: BackupConfig;
    try {
      validated = await validateBackupConfig(config);
    } catch (error) {
      if (this.generation === attempt) {
        this.state = "idle";
      }
      throw error;
    }

    if (this.generation !== attempt) {
      logger.debug("Start superseded by stop() during validation");
      return;
    }

    const session = new BackupSession(validated, this.options.clock);

    this.session = session;
    this.onLog = onLog;
    this.lastPass = null;
    this.scheduler = new Scheduler({
      name: "backup",
      intervalMs: validated.intervalMinutes * 60 * 1000,
      task: async () => {
        this.lastPass = await runBackupPass(session, onLog);
      },
    });
    this.state = "running";

    onLog(
      `Backup service started: ${validated.sourceRoot} -> ${validated.backupRoot} every ${validated.intervalMinutes} minute(s)`,
    );
    this.scheduler.start();
  }

  /**
   * Cancel future passes. A pass already running finishes on its own.
   */
  stop(): void {
    if (this.state === "idle") {
      return;
    }

    this.generation++;
    const wasRunning = this.state === "running";
    this.state = "idle";

    this.scheduler?.stop();

    if (wasRunning) {
      this.onLog?.("Backup service stopped");
    }
  }

  get isRunning(): boolean {
    return this.state === "running";
  }

  /**
   * Resolves when no pass is in flight
   */
  whenIdle(): Promise<void> {
    return this.scheduler?.whenIdle() ?? Promise.resolve();
  }

  getStatus(): ServiceStatus {
    return {
      running: this.isRunning,
      config: this.session?.config ?? null,
      lastBackupTime: this.session?.lastBackupTime ?? null,
      lastPass: this.lastPass,
    };
  }

  /**
   * Independent of any running session; safe to call concurrently for
   * different archive/destination pairs.
   */
  static restore(archivePath: string, destinationDir: string, onLog: LogSink): Promise<RestoreResult> {
    return restoreArchive(archivePath, destinationDir, onLog);
  }
}
