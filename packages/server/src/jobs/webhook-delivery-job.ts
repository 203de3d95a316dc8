import {
  JOB_LABELS,
  WebhookDeliveryPayloadSchema,
  type WebhookDeliveryPayloadInput,
} from '@durable-jobs/shared';
import { createLogger } from '../lib/logger.js';
import type { ReachabilityManager } from '../lib/reachability.js';
import { DurableOperation } from './durable-operation.js';
import type { JobRecord } from './job-record.js';
import { parseJobPayload, type JobType, type RetryBackoff } from './job-type.js';
import { PermanentJobError, RetryableJobError } from './job-errors.js';

const logger = createLogger('webhook-delivery-job');

/** Statuses that may succeed on a later attempt, besides 5xx */
const RETRYABLE_STATUSES = new Set([408, 429]);

function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_STATUSES.has(status);
}

/**
 * POST a JSON body to a webhook URL.
 *
 * Each attempt reports connectivity: a request that gets no response marks
 * the network unreachable, any HTTP response marks it reachable again.
 */
export class WebhookDeliveryOperation extends DurableOperation {
  constructor(
    jobRecord: JobRecord,
    private readonly payload: WebhookDeliveryPayloadInput,
    private readonly reachability: ReachabilityManager
  ) {
    super(jobRecord);
  }

  protected async run(signal: AbortSignal): Promise<void> {
    const { url, body, headers } = this.payload;
    logger.debug({ jobId: this.jobRecord.id, url }, 'Delivering webhook');

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      // fetch rejects with a TypeError when the request never got a response
      if (error instanceof TypeError) {
        this.reachability.setReachable(false);
      }
      throw error;
    }
    this.reachability.setReachable(true);

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      const message = `Webhook delivery failed: ${response.status} - ${errorText}`;
      if (isRetryableStatus(response.status)) {
        throw new RetryableJobError(message);
      }
      throw new PermanentJobError(message);
    }

    logger.info({ jobId: this.jobRecord.id, url, status: response.status }, 'Webhook delivered');
  }
}

export interface WebhookDeliveryJobOptions {
  /** Updated by every delivery attempt */
  reachability: ReachabilityManager;
  retryBackoff?: RetryBackoff;
}

export function createWebhookDeliveryJobType(
  options: WebhookDeliveryJobOptions
): JobType<WebhookDeliveryPayloadInput> {
  return {
    label: JOB_LABELS.WEBHOOK_DELIVER,
    maxRetries: 10,
    requiresInternet: true,
    retryBackoff: options.retryBackoff,
    payloadSchema: WebhookDeliveryPayloadSchema,
    buildOperation(record) {
      return new WebhookDeliveryOperation(
        record,
        parseJobPayload(record, WebhookDeliveryPayloadSchema),
        options.reachability
      );
    },
  };
}
