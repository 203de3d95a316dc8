/**
 * Job Queue Type Definitions
 *
 * Types for the durable job queue: job record statuses, the labels of the
 * built-in job types, their payloads, and the shapes returned by the
 * management API.
 */

/**
 * Job record status constants.
 * Use these instead of raw strings (e.g., JOB_STATUS.READY instead of 'ready').
 */
export const JOB_STATUS = {
  READY: 'ready',
  RUNNING: 'running',
  PERMANENTLY_FAILED: 'permanentlyFailed',
  OBSOLETE: 'obsolete',
  UNKNOWN: 'unknown',
} as const;

/**
 * Job record status in the lifecycle.
 */
export type JobStatus = (typeof JOB_STATUS)[keyof typeof JOB_STATUS];

/**
 * Array of all valid job statuses (for validation).
 */
export const JOB_STATUSES = Object.values(JOB_STATUS);

/**
 * Labels of the built-in job types.
 */
export const JOB_LABELS = {
  /**
   * POST a JSON body to a webhook URL.
   * Payload: WebhookDeliveryPayloadInput
   */
  WEBHOOK_DELIVER: 'webhook:deliver',

  /**
   * Remove a file or directory from disk.
   * Payload: PathCleanupPayloadInput
   */
  CLEANUP_PATH: 'cleanup:path',
} as const;

/**
 * Error fallback when job payload JSON parsing fails (corrupted data).
 */
export interface JobPayloadParseError {
  _parseError: true;
  raw: string;
}

/**
 * A job record as returned from the API.
 */
export interface Job {
  id: number;
  label: string;
  payload: unknown;
  status: JobStatus;
  failureCount: number;
  exclusiveProcessIdentifier: string | null;
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
}

/**
 * Response containing a list of jobs with pagination info.
 */
export interface JobsResponse {
  jobs: Job[];
  total: number;
}

/**
 * Job statistics showing counts by status.
 */
export type JobStats = Record<JobStatus, number>;
