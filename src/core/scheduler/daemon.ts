/**
 * Periodic task runner with a single-flight guarantee
 */

import { logger } from "../../utils/logger";
import { AlreadyRunningError, errorMessage } from "../errors";

export interface SchedulerOptions {
  /** Used in log lines */
  name: string;
  intervalMs: number;
  task: () => Promise<void>;
}

/**
 * Runs the task once on start, then every intervalMs until stopped.
 *
 * At most one run is in flight. A tick that arrives while the previous run
 * is still going is skipped, not queued; the next run happens on the
 * following tick. stop() cancels future ticks but leaves a run in flight
 * to finish on its own.
 */
export class Scheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private skippedTicks = 0;
  private completedRuns = 0;

  constructor(private readonly options: SchedulerOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be positive, got ${options.intervalMs}`);
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get isBusy(): boolean {
    return this.inFlight !== null;
  }

  start(): void {
    if (this.timer) {
      throw new AlreadyRunningError(`Scheduler "${this.options.name}" is already running`);
    }

    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    logger.info(`Scheduler "${this.options.name}" started (every ${this.options.intervalMs / 1000}s)`);

    this.tick();
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;

    logger.info(`Scheduler "${this.options.name}" stopped`);
  }

  /**
   * Resolves once the run in flight, if any, has settled
   */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  getStatus(): { running: boolean; busy: boolean; completedRuns: number; skippedTicks: number } {
    return {
      running: this.isRunning,
      busy: this.isBusy,
      completedRuns: this.completedRuns,
      skippedTicks: this.skippedTicks,
    };
  }

  private tick(): void {
    if (this.inFlight) {
      this.skippedTicks++;
      logger.debug(`Scheduler "${this.options.name}": previous run still in progress, skipping tick`);
      return;
    }

    this.inFlight = this.run().finally(() => {
      this.inFlight = null;
    });
  }

  private async run(): Promise<void> {
    try {
      await this.options.task();
    } catch (error) {
      logger.error(`Scheduler "${this.options.name}" task failed: ${errorMessage(error)}`);
    } finally {
      this.completedRuns++;
    }
  }
}
