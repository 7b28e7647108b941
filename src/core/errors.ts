/**
 * Error taxonomy for backup sessions and restores
 */

/**
 * Source/backup paths or interval rejected before a session starts
 */
export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

export class AlreadyRunningError extends Error {
  constructor(message = "Backup session is already running") {
    super(message);
    this.name = "AlreadyRunningError";
  }
}

/**
 * I/O failure inside a single backup pass. The watermark is left untouched.
 */
export class PassFailureError extends Error {
  constructor(
    message: string,
    readonly startedAt: Date,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PassFailureError";
  }
}

export class RestoreFailureError extends Error {
  constructor(
    message: string,
    readonly archivePath: string,
    /** Entries fully written before the failure */
    readonly entriesRestored: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RestoreFailureError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
