import type { JobStatus } from '@durable-jobs/shared';

/**
 * Base class for errors raised by job types.
 * `isRetryable` tells the queue whether a retry may be consumed.
 */
export abstract class JobError extends Error {
  abstract readonly isRetryable: boolean;
}

/**
 * Transient failure (network, rate limiting). Consumes one retry.
 */
export class RetryableJobError extends JobError {
  readonly isRetryable = true;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RetryableJobError';
  }
}

/**
 * The work can never succeed. The record is marked permanently failed
 * regardless of remaining retries.
 */
export class PermanentJobError extends JobError {
  readonly isRetryable = false;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PermanentJobError';
  }
}

/**
 * The work is no longer relevant (e.g. superseded by newer state).
 * The record is marked obsolete.
 */
export class ObsoleteJobError extends JobError {
  readonly isRetryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'ObsoleteJobError';
  }
}

/**
 * A status transition was attempted on a record that is not in the
 * expected status (or no longer exists).
 */
export class InvalidJobTransitionError extends Error {
  constructor(
    public readonly jobId: number,
    public readonly expected: JobStatus,
    public readonly target: JobStatus | 'deleted'
  ) {
    super(`Job ${jobId} is not ${expected}, cannot move it to ${target}`);
    this.name = 'InvalidJobTransitionError';
  }
}

/**
 * A job type with the same label is already registered.
 */
export class DuplicateJobTypeError extends Error {
  constructor(public readonly label: string) {
    super(`Job type already registered: ${label}`);
    this.name = 'DuplicateJobTypeError';
  }
}

/**
 * No job type is registered for the label.
 */
export class UnknownJobTypeError extends Error {
  constructor(public readonly label: string) {
    super(`No job type registered for label: ${label}`);
    this.name = 'UnknownJobTypeError';
  }
}

/**
 * Default retry policy: job errors decide for themselves, anything else
 * (network errors, timeouts, unexpected exceptions) consumes a retry.
 */
export function defaultIsRetryable(error: unknown): boolean {
  if (error instanceof JobError) {
    return error.isRetryable;
  }
  return true;
}
