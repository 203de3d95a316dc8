import type { DatabaseStorage } from '../database/storage.js';
import type { AppReadiness } from '../lib/app-readiness.js';
import type { ReachabilityManager } from '../lib/reachability.js';
import { createLogger } from '../lib/logger.js';
import { JobQueue } from './job-queue.js';
import type { JobTypeRegistry } from './job-type-registry.js';
import { UnknownJobTypeError } from './job-errors.js';

const logger = createLogger('job-queues');

export interface JobQueuesOptions {
  registry: JobTypeRegistry;
  storage: DatabaseStorage;
  readiness: AppReadiness;
  reachability: ReachabilityManager;
  processIdentifier: string;
  isPrimaryProcess?: boolean;
}

/**
 * One JobQueue per registered job type.
 */
export class JobQueues {
  private queues = new Map<string, JobQueue>();

  constructor(options: JobQueuesOptions) {
    const { registry, ...queueOptions } = options;
    for (const jobType of registry.all()) {
      this.queues.set(jobType.label, new JobQueue({ ...queueOptions, jobType }));
    }
  }

  get labels(): string[] {
    return [...this.queues.keys()];
  }

  has(label: string): boolean {
    return this.queues.has(label);
  }

  /**
   * @throws UnknownJobTypeError if no queue exists for the label
   */
  get(label: string): JobQueue {
    const queue = this.queues.get(label);
    if (!queue) {
      throw new UnknownJobTypeError(label);
    }
    return queue;
  }

  async setup(): Promise<void> {
    for (const queue of this.queues.values()) {
      await queue.setup();
    }
    logger.info({ labels: this.labels }, 'Job queues set up');
  }

  async stop(): Promise<void> {
    await Promise.all([...this.queues.values()].map((queue) => queue.stop()));
  }
}
