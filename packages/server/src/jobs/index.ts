/**
 * Durable job queue module.
 *
 * Job records are persisted in SQLite and survive crashes; each label has
 * its own queue, worker pool and retry policy.
 */
export { JobQueue, type JobQueueOptions, type AddJobOptions } from './job-queue.js';
export { JobQueues, type JobQueuesOptions } from './job-queues.js';
export { JobRecordStore, type InsertJobRecordParams, type JobRecordFilter } from './job-record-store.js';
export type { JobRecord } from './job-record.js';
export {
  DurableOperation,
  type DurableOperationDelegate,
  type RetryPolicy,
} from './durable-operation.js';
export { OperationQueue } from './operation-queue.js';
export {
  DEFAULT_RETRY_BACKOFF,
  parseJobPayload,
  type JobType,
  type RetryBackoff,
} from './job-type.js';
export { JobTypeRegistry } from './job-type-registry.js';
export {
  JobError,
  RetryableJobError,
  PermanentJobError,
  ObsoleteJobError,
  InvalidJobTransitionError,
  DuplicateJobTypeError,
  UnknownJobTypeError,
  defaultIsRetryable,
} from './job-errors.js';
export {
  initializeJobQueues,
  getJobQueues,
  resetJobQueues,
  isJobQueuesInitialized,
} from './job-queue-instance.js';
export { registerJobTypes, type JobTypeDependencies } from './handlers.js';
export {
  createWebhookDeliveryJobType,
  WebhookDeliveryOperation,
  type WebhookDeliveryJobOptions,
} from './webhook-delivery-job.js';
export { pathCleanupJobType, PathCleanupOperation } from './path-cleanup-job.js';
