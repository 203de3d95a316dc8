import type { JobRecord } from './job-record.js';
import { DEFAULT_RETRY_BACKOFF, type RetryBackoff } from './job-type.js';
import { ObsoleteJobError, defaultIsRetryable } from './job-errors.js';

/**
 * Receives the outcome of each attempt. Implemented by the job queue,
 * which persists the outcome in its own write transaction.
 */
export interface DurableOperationDelegate {
  durableOperationDidSucceed(operation: DurableOperation): Promise<void>;
  /** A retryable failure; the operation will try again after its backoff */
  durableOperationDidReportError(operation: DurableOperation, error: unknown): Promise<void>;
  /** A terminal failure. ObsoleteJobError means the work is no longer relevant */
  durableOperationDidFail(operation: DurableOperation, error: unknown): Promise<void>;
}

export interface RetryPolicy {
  maxRetries: number;
  retryBackoff?: RetryBackoff;
  isRetryable?(error: unknown): boolean;
}

interface RetryWait {
  timeout: NodeJS.Timeout;
  finish(released: boolean): void;
}

/**
 * One claimed job record's work, retried in place until it succeeds,
 * runs out of retries or is cancelled.
 *
 * Subclasses implement `run`. Resolving means success; throwing means
 * failure. Implementations should watch the signal and stop early when
 * it aborts.
 */
export abstract class DurableOperation {
  private delegate: DurableOperationDelegate | null = null;
  private policy: Required<RetryPolicy> = {
    maxRetries: 0,
    retryBackoff: DEFAULT_RETRY_BACKOFF,
    isRetryable: defaultIsRetryable,
  };
  private _failureCount: number;
  private _remainingRetries = 0;
  private readonly abortController = new AbortController();
  private retryWait: RetryWait | null = null;

  constructor(readonly jobRecord: JobRecord) {
    this._failureCount = jobRecord.failureCount;
  }

  protected abstract run(signal: AbortSignal): Promise<void>;

  /**
   * Set the delegate and retry policy. Must be called before `execute`.
   */
  attach(delegate: DurableOperationDelegate, policy: RetryPolicy): void {
    this.delegate = delegate;
    this.policy = {
      maxRetries: policy.maxRetries,
      retryBackoff: policy.retryBackoff ?? DEFAULT_RETRY_BACKOFF,
      isRetryable: policy.isRetryable ?? defaultIsRetryable,
    };
    this._remainingRetries = Math.max(0, policy.maxRetries - this._failureCount);
  }

  get maxRetries(): number {
    return this.policy.maxRetries;
  }

  /** Failures recorded for the job, including those of this operation */
  get failureCount(): number {
    return this._failureCount;
  }

  get remainingRetries(): number {
    return this._remainingRetries;
  }

  get isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  get isWaitingForRetry(): boolean {
    return this.retryWait !== null;
  }

  /**
   * Delay before the next attempt, based on the failures recorded so far.
   */
  retryInterval(): number {
    const { baseMs, maxMs } = this.policy.retryBackoff;
    const exponent = Math.max(0, this._failureCount - 1);
    return Math.min(maxMs, baseMs * 2 ** exponent);
  }

  /**
   * Run attempts until an outcome is reported or the operation is cancelled.
   */
  async execute(): Promise<void> {
    const delegate = this.delegate;
    if (!delegate) {
      throw new Error(`Operation for job ${this.jobRecord.id} has no delegate`);
    }

    for (;;) {
      if (this.isCancelled) {
        return;
      }

      try {
        await this.run(this.abortController.signal);
      } catch (error) {
        if (this.isCancelled) {
          return;
        }
        if (
          !(error instanceof ObsoleteJobError) &&
          this._remainingRetries > 0 &&
          this.policy.isRetryable(error)
        ) {
          this._remainingRetries -= 1;
          this._failureCount += 1;
          await delegate.durableOperationDidReportError(this, error);
          const released = await this.waitForRetry();
          if (!released) {
            return;
          }
          continue;
        }
        await delegate.durableOperationDidFail(this, error);
        return;
      }

      if (this.isCancelled) {
        return;
      }
      await delegate.durableOperationDidSucceed(this);
      return;
    }
  }

  /**
   * Skip the remainder of the current backoff.
   * @returns true if a waiting retry was released
   */
  runAnyQueuedRetry(): boolean {
    if (!this.retryWait) {
      return false;
    }
    this.retryWait.finish(true);
    return true;
  }

  /**
   * Stop the operation without reporting an outcome. The record stays
   * running until the next restart recovers it.
   */
  cancel(): void {
    this.abortController.abort();
    this.retryWait?.finish(false);
  }

  private waitForRetry(): Promise<boolean> {
    if (this.isCancelled) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      const wait: RetryWait = {
        timeout: setTimeout(() => wait.finish(true), this.retryInterval()),
        finish: (released) => {
          clearTimeout(wait.timeout);
          this.retryWait = null;
          resolve(released);
        },
      };
      this.retryWait = wait;
    });
  }
}
