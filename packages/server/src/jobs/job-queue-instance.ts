/**
 * JobQueues singleton instance management.
 *
 * The server creates the instance once at startup; routes look it up
 * to signal work after a manual retry.
 */
import { JobQueues, type JobQueuesOptions } from './job-queues.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('job-queue-instance');

let jobQueuesInstance: JobQueues | null = null;

/**
 * Create the singleton JobQueues instance.
 * @throws Error if already initialized
 */
export function initializeJobQueues(options: JobQueuesOptions): JobQueues {
  if (jobQueuesInstance) {
    throw new Error('JobQueues already initialized');
  }
  jobQueuesInstance = new JobQueues(options);
  logger.info({ labels: jobQueuesInstance.labels }, 'JobQueues instance created');
  return jobQueuesInstance;
}

/**
 * Get the singleton JobQueues instance.
 * @throws Error if not initialized
 */
export function getJobQueues(): JobQueues {
  if (!jobQueuesInstance) {
    throw new Error('JobQueues not initialized. Call initializeJobQueues() first.');
  }
  return jobQueuesInstance;
}

/**
 * Stop and forget the singleton instance.
 * Used for testing to ensure test isolation.
 */
export async function resetJobQueues(): Promise<void> {
  if (jobQueuesInstance) {
    await jobQueuesInstance.stop();
    jobQueuesInstance = null;
    logger.debug('JobQueues instance reset');
  }
}

export function isJobQueuesInitialized(): boolean {
  return jobQueuesInstance !== null;
}
