/**
 * Backup session state
 */

import type { BackupConfig, Watermark } from "../../types";

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

/**
 * Holds the frozen config and the in-memory watermark of one backup
 * session. Nothing here is persisted; a new process starts from "never".
 */
export class BackupSession {
  readonly config: Readonly<BackupConfig>;
  private watermark: Watermark = null;

  constructor(
    config: BackupConfig,
    private readonly clock: Clock = systemClock,
  ) {
    this.config = Object.freeze({ ...config });
  }

  /** A copy; mutating it does not touch the session */
  get lastBackupTime(): Watermark {
    return this.watermark && new Date(this.watermark.getTime());
  }

  now(): Date {
    return this.clock();
  }

  /**
   * Move the watermark forward. Never moves it back, even if the clock does.
   */
  advanceWatermark(to: Date): void {
    if (this.watermark === null || to.getTime() > this.watermark.getTime()) {
      this.watermark = new Date(to.getTime());
    }
  }
}
