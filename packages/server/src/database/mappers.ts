import { JOB_STATUS, JOB_STATUSES, type JobStatus } from '@durable-jobs/shared';
import type { JobRecordRow } from './schema.js';
import type { JobRecord } from '../jobs/job-record.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('database-mappers');

function isJobStatus(value: string): value is JobStatus {
  return (JOB_STATUSES as readonly string[]).includes(value);
}

/**
 * Read a stored status, mapping anything unrecognized to 'unknown'.
 */
export function toJobStatus(value: string): JobStatus {
  if (isJobStatus(value)) {
    return value;
  }
  logger.warn({ status: value }, 'Unrecognized job status, treating as unknown');
  return JOB_STATUS.UNKNOWN;
}

/**
 * Convert a database row to a job record.
 */
export function toJobRecord(row: JobRecordRow): JobRecord {
  return {
    id: row.id,
    label: row.label,
    status: toJobStatus(row.status),
    failureCount: row.failure_count,
    exclusiveProcessIdentifier: row.exclusive_process_identifier,
    payload: row.payload,
    lastError: row.last_error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
