/**
 * @file Error classes shared by the acquisition, orchestration and configuration layers.
 */

/**
 * Additional details carried by an {@link AppError}.
 * @property errorCode - Stable code identifying the failure (e.g. `RETRIEVAL_FAILED`, `FS_READFILE_FAILED`).
 * @property isOperational - True for expected runtime failures, false for programmer errors.
 * @property originalError - The wrapped error, if any.
 */
export interface AppErrorDetails {
  errorCode?: string;
  isOperational?: boolean;
  originalError?: unknown;
  [key: string]: unknown;
}

/**
 * Base error for the application. Extends `Error` with a details bag
 * holding an error code and context.
 */
export class AppError extends Error {
  public readonly details?: AppErrorDetails;

  constructor(message: string, details?: AppErrorDetails) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;

    // Keeps the constructor frames out of the V8 stack trace.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get errorCode(): string | undefined {
    return this.details?.errorCode;
  }
}

/**
 * Thrown by the page fetcher once every attempt for one URL has failed.
 * Terminal for that URL only; the orchestrator turns it into an error record.
 */
export class RetrievalError extends AppError {
  public readonly url: string;
  public readonly attempts: number;

  constructor(url: string, attempts: number, lastError?: unknown) {
    const reason =
      lastError instanceof Error ? lastError.message : 'unknown cause';
    super(`Failed to retrieve URL: ${url} after ${attempts} attempts (${reason})`, {
      errorCode: 'RETRIEVAL_FAILED',
      isOperational: true,
      originalError: lastError,
      url,
      attempts,
    });
    this.url = url;
    this.attempts = attempts;
  }
}

/**
 * Wraps an unexpected exception raised while a batch was running.
 * Caught at the orchestrator boundary; never escapes a run.
 */
export class BatchError extends AppError {
  public readonly batchId: number;

  constructor(batchId: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Batch ${batchId} failed: ${reason}`, {
      errorCode: 'BATCH_FAILED',
      isOperational: true,
      originalError: cause,
      batchId,
    });
    this.batchId = batchId;
  }
}

/**
 * Raised when configuration values are out of range. Fatal at startup.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, key: string) {
    super(message, { errorCode: 'CONFIG_INVALID', isOperational: false, key });
  }
}

/**
 * Returns a printable message for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return JSON.stringify(error) ?? String(error);
}
