import type { JobHandle, JobStatus } from './entities/Job.js';

/**
 * Base class for every error this service raises on purpose
 */
export class VideoSearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The processor rejected a submission (quota, malformed content). Never retried.
 */
export class SubmissionError extends VideoSearchError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Network failure, timeout, 429 or 5xx talking to the processor
 */
export class TransientCommunicationError extends VideoSearchError {
  constructor(
    message: string,
    public readonly attempts: number = 1,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The processor reported a terminal failure; `detail` is passed through verbatim
 */
export class JobFailedError extends VideoSearchError {
  constructor(
    public readonly handle: JobHandle,
    public readonly detail: string
  ) {
    super(`Job ${handle} failed: ${detail}`);
  }
}

/**
 * Local deadline passed while the job was still running. The job is not
 * cancelled remotely and may still complete; re-check it with the same handle.
 */
export class TimeoutError extends VideoSearchError {
  constructor(
    public readonly handle: JobHandle,
    public readonly lastStatus: JobStatus,
    public readonly elapsedMs: number,
    public readonly polls: number
  ) {
    super(
      `Job ${handle} still ${lastStatus} after ${elapsedMs}ms (${polls} polls); it may complete later`
    );
  }
}

/**
 * Non-transient provider failure outside submission (bad credentials, unknown task)
 */
export class ProviderRequestError extends VideoSearchError {
  constructor(
    message: string,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class IndexNotFoundError extends VideoSearchError {
  constructor() {
    super('No index found. Run video ingestion first.');
  }
}

export class UnknownJobError extends VideoSearchError {
  constructor(public readonly handle: JobHandle) {
    super(`No ingestion job with handle ${handle}`);
  }
}

export class ConfigValidationError extends VideoSearchError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

export function isTransientError(error: unknown): error is TransientCommunicationError {
  return error instanceof TransientCommunicationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
