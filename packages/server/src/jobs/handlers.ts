/**
 * Built-in job types:
 * - webhook:deliver - POST a JSON body to a webhook URL
 * - cleanup:path - Remove a file or directory
 */
import type { JobTypeRegistry } from './job-type-registry.js';
import { createWebhookDeliveryJobType } from './webhook-delivery-job.js';
import { pathCleanupJobType } from './path-cleanup-job.js';
import { createLogger } from '../lib/logger.js';
import type { ReachabilityManager } from '../lib/reachability.js';

const logger = createLogger('job-handlers');

export interface JobTypeDependencies {
  /** Shared with the job queues, which retry on reconnect */
  reachability: ReachabilityManager;
}

/**
 * Register all built-in job types.
 */
export function registerJobTypes(registry: JobTypeRegistry, deps: JobTypeDependencies): void {
  registry.register(createWebhookDeliveryJobType({ reachability: deps.reachability }));
  registry.register(pathCleanupJobType);
  logger.info({ labels: registry.labels }, 'Job types registered');
}
