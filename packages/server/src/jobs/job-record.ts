import type { JobStatus } from '@durable-jobs/shared';

/**
 * A persisted unit of work and its retry state.
 *
 * The payload stays in its serialized form: only the job type that owns
 * the label knows how to interpret it.
 */
export interface JobRecord {
  /** Monotonically increasing id; claim order within a label */
  id: number;
  /** Job type label */
  label: string;
  status: JobStatus;
  /** Retryable failures recorded so far */
  failureCount: number;
  /** Process allowed to claim this record, or null for any process */
  exclusiveProcessIdentifier: string | null;
  /** JSON-serialized payload */
  payload: string;
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
}

