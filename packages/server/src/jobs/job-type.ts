import * as v from 'valibot';
import type { WriteTransaction } from '../database/storage.js';
import type { JobRecord } from './job-record.js';
import type { DurableOperation } from './durable-operation.js';
import { PermanentJobError } from './job-errors.js';

/**
 * Exponential backoff between retry attempts.
 */
export interface RetryBackoff {
  baseMs: number;
  maxMs: number;
}

export const DEFAULT_RETRY_BACKOFF: RetryBackoff = {
  baseMs: 1000,
  maxMs: 5 * 60 * 1000,
};

/**
 * Definition of a kind of durable work, identified by its label.
 */
export interface JobType<TPayload = unknown> {
  label: string;
  /** Retries allowed after the first attempt */
  maxRetries: number;
  /** Retry waiting operations as soon as the network becomes reachable */
  requiresInternet: boolean;
  /** Default: unbounded */
  maxConcurrentOperations?: number;
  /** A disabled job type never claims records. Default: true */
  isEnabled?: boolean;
  retryBackoff?: RetryBackoff;
  payloadSchema: v.GenericSchema<unknown, TPayload>;
  /**
   * Build the operation for a claimed record. Throw PermanentJobError or
   * ObsoleteJobError when the record can never be run.
   */
  buildOperation(record: JobRecord): DurableOperation;
  /** Default: defaultIsRetryable */
  isRetryable?(error: unknown): boolean;
  /** Called for each running record reset to ready on startup */
  didMarkAsReady?(record: JobRecord, tx: WriteTransaction): Promise<void>;
}

/**
 * Decode a record's payload with the job type's schema.
 * A payload that cannot be decoded will never run, so it is a permanent failure.
 */
export function parseJobPayload<TPayload>(
  record: JobRecord,
  schema: v.GenericSchema<unknown, TPayload>
): TPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(record.payload);
  } catch (error) {
    throw new PermanentJobError(`Job ${record.id} has a corrupt payload`, { cause: error });
  }

  const result = v.safeParse(schema, raw);
  if (!result.success) {
    throw new PermanentJobError(`Job ${record.id} has an invalid payload: ${result.issues[0].message}`);
  }
  return result.output;
}
