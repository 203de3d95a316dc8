import { EventEmitter } from 'events';
import type { DurableOperation } from './durable-operation.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('operation-queue');

/**
 * FIFO worker pool for durable operations.
 * At most `maxConcurrentOperations` execute at once; the rest wait their turn.
 */
export class OperationQueue {
  private pending: DurableOperation[] = [];
  private executing = 0;
  private emitter = new EventEmitter();

  constructor(
    readonly name: string,
    readonly maxConcurrentOperations: number = Infinity
  ) {
    if (!(maxConcurrentOperations >= 1)) {
      throw new Error(`maxConcurrentOperations must be at least 1, got ${maxConcurrentOperations}`);
    }
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get executingCount(): number {
    return this.executing;
  }

  get isIdle(): boolean {
    return this.executing === 0 && this.pending.length === 0;
  }

  addOperation(operation: DurableOperation): void {
    this.pending.push(operation);
    this.tryStart();
  }

  /**
   * Drop operations that have not started yet.
   * @returns The dropped operations
   */
  drainPending(): DurableOperation[] {
    const dropped = this.pending;
    this.pending = [];
    if (this.isIdle) {
      this.emitter.emit('idle');
    }
    return dropped;
  }

  /**
   * Resolves when nothing is queued or executing.
   */
  onIdle(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.emitter.once('idle', resolve));
  }

  private tryStart(): void {
    while (this.executing < this.maxConcurrentOperations) {
      const operation = this.pending.shift();
      if (!operation) break;

      this.executing++;
      operation
        .execute()
        .catch((error: unknown) => {
          logger.error(
            { queue: this.name, jobId: operation.jobRecord.id, err: error },
            'Operation ended with an error'
          );
        })
        .finally(() => {
          this.executing--;
          this.tryStart();
          if (this.isIdle) {
            this.emitter.emit('idle');
          }
        });
    }
  }
}
