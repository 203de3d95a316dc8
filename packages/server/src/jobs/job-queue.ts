/**
 * Durable job queue for a single job type.
 *
 * Job records are persisted before any work starts and survive crashes.
 * Each claimed record is handed to a DurableOperation, which retries in
 * place with exponential backoff until it succeeds, fails permanently or
 * becomes obsolete.
 *
 * Features:
 * - Event-driven processing (no polling): one drain loop per queue
 * - Crash recovery: running records are reset to ready on startup
 * - Pruning of records that will never run in this process
 * - Bounded concurrency per job type
 * - Immediate retry when the network becomes reachable
 */
import * as v from 'valibot';
import { JOB_STATUS } from '@durable-jobs/shared';
import type { DatabaseStorage, WriteTransaction } from '../database/storage.js';
import type { AppReadiness } from '../lib/app-readiness.js';
import type { ReachabilityManager } from '../lib/reachability.js';
import { createLogger } from '../lib/logger.js';
import { JobRecordStore } from './job-record-store.js';
import type { JobRecord } from './job-record.js';
import type { JobType } from './job-type.js';
import type { DurableOperation, DurableOperationDelegate } from './durable-operation.js';
import { OperationQueue } from './operation-queue.js';
import { ObsoleteJobError, defaultIsRetryable } from './job-errors.js';

const logger = createLogger('job-queue');

/**
 * Options for creating a JobQueue.
 */
export interface JobQueueOptions<TPayload> {
  jobType: JobType<TPayload>;
  storage: DatabaseStorage;
  readiness: AppReadiness;
  reachability: ReachabilityManager;
  /** Identifier of this process, matched against exclusive records */
  processIdentifier: string;
  /** Only the primary process restarts and prunes records. Default: true */
  isPrimaryProcess?: boolean;
  store?: JobRecordStore;
}

/**
 * Options for adding a job.
 */
export interface AddJobOptions {
  /** Only the process with this identifier may run the job */
  exclusiveProcessIdentifier?: string | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class JobQueue<TPayload = unknown> implements DurableOperationDelegate {
  private readonly jobType: JobType<TPayload>;
  private readonly storage: DatabaseStorage;
  private readonly readiness: AppReadiness;
  private readonly reachability: ReachabilityManager;
  private readonly processIdentifier: string;
  private readonly isPrimaryProcess: boolean;
  private readonly store: JobRecordStore;
  private readonly operationQueue: OperationQueue;
  private readonly operations = new Map<number, DurableOperation>();

  private setupCalled = false;
  private isSetUp = false;
  private stopped = false;
  private hasDeferredWork = false;
  private workRequested = false;
  private draining: Promise<void> | null = null;
  private unsubscribeReachability: (() => void) | null = null;

  constructor(options: JobQueueOptions<TPayload>) {
    this.jobType = options.jobType;
    this.storage = options.storage;
    this.readiness = options.readiness;
    this.reachability = options.reachability;
    this.processIdentifier = options.processIdentifier;
    this.isPrimaryProcess = options.isPrimaryProcess ?? true;
    this.store = options.store ?? new JobRecordStore();
    this.operationQueue = new OperationQueue(
      this.jobType.label,
      this.jobType.maxConcurrentOperations
    );
  }

  get label(): string {
    return this.jobType.label;
  }

  get isEnabled(): boolean {
    return this.jobType.isEnabled ?? true;
  }

  /**
   * Operations currently holding a running record, by job id.
   */
  get runningOperations(): ReadonlyMap<number, DurableOperation> {
    return this.operations;
  }

  /**
   * Resolves when no operation of this queue is queued or executing.
   */
  onIdle(): Promise<void> {
    return this.operationQueue.onIdle();
  }

  // ===========================================================================
  // Adding work
  // ===========================================================================

  /**
   * Persist a new job inside the caller's transaction.
   * Work starts once the transaction commits.
   * @throws ValiError if the payload does not match the job type's schema
   */
  async add(tx: WriteTransaction, payload: TPayload, options?: AddJobOptions): Promise<JobRecord> {
    const parsed = v.parse(this.jobType.payloadSchema, payload);
    const record = await this.store.insert(tx, {
      label: this.label,
      payload: parsed,
      exclusiveProcessIdentifier: options?.exclusiveProcessIdentifier,
    });

    logger.info({ label: this.label, jobId: record.id }, 'Job added');

    if (this.canStartWork()) {
      tx.addFinalizationBlock(`work-step:${this.label}`, async (tx) => {
        await this.workStep(tx);
      });
    }
    tx.addAsyncCompletion(() => this.signalWork());
    return record;
  }

  /**
   * Persist a new job in its own transaction.
   */
  async enqueue(payload: TPayload, options?: AddJobOptions): Promise<JobRecord> {
    return this.storage.write((tx) => this.add(tx, payload, options));
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Recover and prune records, then start work once the app is ready.
   * May only be called once.
   */
  async setup(): Promise<void> {
    if (this.setupCalled) {
      throw new Error(`Job queue ${this.label} is already set up`);
    }
    this.setupCalled = true;

    if (!this.isEnabled) {
      logger.info({ label: this.label }, 'Job type disabled, queue will not run');
      return;
    }

    await this.restartOldJobs();
    await this.pruneStaleJobs();

    if (this.jobType.requiresInternet) {
      this.unsubscribeReachability = this.reachability.onChange((isReachable) => {
        if (isReachable) {
          this.becameReachable();
        }
      });
    }

    this.isSetUp = true;
    logger.debug({ label: this.label }, 'Job queue set up');
    this.startWorkWhenAppIsReady();
  }

  /**
   * Stop claiming records and cancel in-flight operations.
   * Cancelled records stay running and are recovered on the next startup.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    this.unsubscribeReachability?.();
    this.unsubscribeReachability = null;

    this.operationQueue.drainPending();
    for (const operation of this.operations.values()) {
      operation.cancel();
    }
    this.operations.clear();

    await this.draining;
    await this.operationQueue.onIdle();
    logger.info({ label: this.label }, 'Job queue stopped');
  }

  // ===========================================================================
  // Recovery
  // ===========================================================================

  /**
   * Reset records left running by a previous process to ready.
   * Only valid before setup completes: afterwards running records belong
   * to live operations.
   * @returns Number of records reset
   * @throws Error if the queue is already set up
   */
  async restartOldJobs(): Promise<number> {
    if (this.isSetUp) {
      throw new Error(`Job queue ${this.label} is already running, cannot restart its jobs`);
    }
    if (!this.isPrimaryProcess) {
      return 0;
    }

    const count = await this.storage.write(async (tx) => {
      const records = await this.store.all(tx, this.label, JOB_STATUS.RUNNING);
      let reset = 0;
      for (const record of records) {
        const ready = await this.store.saveRunningAsReady(tx, record);
        try {
          await this.jobType.didMarkAsReady?.(ready, tx);
          reset++;
        } catch (error) {
          logger.error(
            { label: this.label, jobId: record.id, err: error },
            'Failed to reset job, marking as permanently failed'
          );
          // Back through running so the record follows its normal transitions
          const running = await this.store.saveReadyAsRunning(tx, ready);
          await this.store.saveAsPermanentlyFailed(tx, running, errorMessage(error));
        }
      }
      return reset;
    });

    if (count > 0) {
      logger.info({ label: this.label, count }, 'Restarted jobs left running');
    }
    return count;
  }

  /**
   * Delete records that will never run in this process.
   * @returns Ids of the deleted records
   */
  async pruneStaleJobs(): Promise<number[]> {
    if (!this.isPrimaryProcess) {
      return [];
    }

    const ids = await this.storage.write(async (tx) => {
      const stale = await this.store.staleRecords(tx, this.label, this.processIdentifier);
      const staleIds = stale.map((record) => record.id);
      await this.store.removeAll(tx, staleIds);
      return staleIds;
    });

    if (ids.length > 0) {
      logger.info({ label: this.label, count: ids.length }, 'Pruned stale jobs');
    }
    return ids;
  }

  // ===========================================================================
  // Work scheduling
  // ===========================================================================

  /**
   * Request a drain cycle. Requests made before setup completes (or
   * before the app is ready) are honored once work starts.
   */
  signalWork(): void {
    if (!this.canStartWork()) {
      if (!this.stopped && this.isEnabled) {
        this.hasDeferredWork = true;
      }
      return;
    }

    this.workRequested = true;
    if (!this.draining) {
      this.draining = this.drain().finally(() => {
        this.draining = null;
        // Signals that arrived during a failed cycle start a new one
        if (this.workRequested) {
          this.signalWork();
        }
      });
    }
  }

  /**
   * Claim the next ready record and hand it to an operation.
   * @returns true if a record was consumed (claimed or terminally marked)
   */
  async workStep(tx: WriteTransaction): Promise<boolean> {
    if (this.stopped || !this.isEnabled) {
      return false;
    }

    const next = await this.store.nextReady(tx, this.label, this.processIdentifier);
    if (!next) {
      return false;
    }
    const record = await this.store.saveReadyAsRunning(tx, next);

    let operation: DurableOperation;
    try {
      operation = this.jobType.buildOperation(record);
    } catch (error) {
      if (error instanceof ObsoleteJobError) {
        await this.store.saveAsObsolete(tx, record, error.message);
        logger.info({ label: this.label, jobId: record.id }, 'Job is obsolete');
      } else {
        await this.store.saveAsPermanentlyFailed(tx, record, errorMessage(error));
        logger.error(
          { label: this.label, jobId: record.id, err: error },
          'Could not build operation, job permanently failed'
        );
      }
      return true;
    }

    operation.attach(this, {
      maxRetries: this.jobType.maxRetries,
      retryBackoff: this.jobType.retryBackoff,
      isRetryable: (error) =>
        this.jobType.isRetryable ? this.jobType.isRetryable(error) : defaultIsRetryable(error),
    });

    tx.addSyncCompletion(() => {
      if (this.stopped) {
        return;
      }
      this.operations.set(record.id, operation);
      this.operationQueue.addOperation(operation);
    });

    logger.debug(
      { label: this.label, jobId: record.id, remainingRetries: operation.remainingRetries },
      'Job claimed'
    );
    return true;
  }

  /**
   * Retry waiting operations now that the network is back.
   */
  becameReachable(): void {
    const released = this.runAnyQueuedRetry();
    logger.debug({ label: this.label, released }, 'Network reachable');
  }

  /**
   * Release every operation waiting out its backoff. No new record is claimed.
   * @returns Number of released operations
   */
  runAnyQueuedRetry(): number {
    let released = 0;
    for (const operation of this.operations.values()) {
      if (operation.runAnyQueuedRetry()) {
        released++;
      }
    }
    return released;
  }

  private canStartWork(): boolean {
    return this.isSetUp && !this.stopped && this.isEnabled && this.readiness.isAppReady;
  }

  private startWorkWhenAppIsReady(): void {
    this.readiness.runNowOrWhenAppDidBecomeReady(() => {
      if (this.hasDeferredWork) {
        logger.debug({ label: this.label }, 'Starting deferred work');
        this.hasDeferredWork = false;
      }
      this.signalWork();
    });
  }

  private async drain(): Promise<void> {
    while (this.workRequested && !this.stopped) {
      this.workRequested = false;
      try {
        let consumed = true;
        while (consumed && !this.stopped) {
          consumed = await this.storage.write((tx) => this.workStep(tx));
        }
      } catch (error) {
        // The next signal resumes the cycle
        logger.error({ label: this.label, err: error }, 'Work step failed');
        return;
      }
    }
  }

  // ===========================================================================
  // DurableOperationDelegate
  // ===========================================================================

  async durableOperationDidSucceed(operation: DurableOperation): Promise<void> {
    const { id } = operation.jobRecord;
    await this.finish(operation, async (tx) => {
      await this.store.remove(tx, operation.jobRecord);
    });
    logger.info({ label: this.label, jobId: id }, 'Job completed');
  }

  async durableOperationDidReportError(operation: DurableOperation, error: unknown): Promise<void> {
    const { id } = operation.jobRecord;
    try {
      await this.storage.write((tx) =>
        this.store.addFailure(tx, operation.jobRecord, errorMessage(error))
      );
    } catch (storageError) {
      // An unsaved failure would restore the retry on restart; stop here instead
      logger.error(
        { label: this.label, jobId: id, err: storageError },
        'Failed to record job failure, marking as permanently failed'
      );
      operation.cancel();
      await this.finish(operation, async (tx) => {
        await this.store.saveAsPermanentlyFailed(tx, operation.jobRecord, errorMessage(error));
      });
      return;
    }

    logger.warn(
      {
        label: this.label,
        jobId: id,
        failureCount: operation.failureCount,
        remainingRetries: operation.remainingRetries,
        err: error,
      },
      'Job failed, will retry'
    );
    this.signalWork();
  }

  async durableOperationDidFail(operation: DurableOperation, error: unknown): Promise<void> {
    const { id } = operation.jobRecord;
    if (error instanceof ObsoleteJobError) {
      await this.finish(operation, async (tx) => {
        await this.store.saveAsObsolete(tx, operation.jobRecord, error.message);
      });
      logger.info({ label: this.label, jobId: id }, 'Job is obsolete');
      return;
    }

    await this.finish(operation, async (tx) => {
      await this.store.saveAsPermanentlyFailed(tx, operation.jobRecord, errorMessage(error));
    });
    logger.error({ label: this.label, jobId: id, err: error }, 'Job permanently failed');
  }

  /**
   * Persist a terminal outcome and drop the operation from the registry.
   */
  private async finish(
    operation: DurableOperation,
    block: (tx: WriteTransaction) => Promise<void>
  ): Promise<void> {
    const { id } = operation.jobRecord;
    try {
      await this.storage.write(async (tx) => {
        await block(tx);
        tx.addSyncCompletion(() => {
          this.operations.delete(id);
        });
      });
    } catch (error) {
      // Record stays running and is recovered on the next startup
      logger.error({ label: this.label, jobId: id, err: error }, 'Failed to save job outcome');
      this.operations.delete(id);
    }
    this.signalWork();
  }
}
