import * as v from 'valibot';
import { JOB_STATUSES } from '../types/job.js';

/**
 * Schema for webhook:deliver payloads
 */
export const WebhookDeliveryPayloadSchema = v.object({
  url: v.pipe(
    v.string(),
    v.url('url must be a valid URL'),
    v.regex(/^https?:\/\//i, 'url must use http or https')
  ),
  body: v.unknown(),
  headers: v.optional(v.record(v.string(), v.string())),
});

/**
 * Schema for cleanup:path payloads
 */
export const PathCleanupPayloadSchema = v.object({
  path: v.pipe(
    v.string(),
    v.trim(),
    v.minLength(1, 'Path is required')
  ),
});

/**
 * Numeric query parameter, accepted as a string and converted.
 */
function integerParam(defaultValue: string, min: number, max: number, message: string) {
  return v.pipe(
    v.optional(v.string(), defaultValue),
    v.transform(Number),
    v.integer(message),
    v.minValue(min, message),
    v.maxValue(max, message)
  );
}

/**
 * Schema for the job list query string
 */
export const JobListQuerySchema = v.object({
  label: v.optional(v.pipe(v.string(), v.minLength(1, 'label must not be empty'))),
  status: v.optional(
    v.picklist(JOB_STATUSES, `status must be one of: ${JOB_STATUSES.join(', ')}`)
  ),
  limit: integerParam('50', 1, 1000, 'limit must be a number between 1 and 1000'),
  offset: integerParam('0', 0, Number.MAX_SAFE_INTEGER, 'offset must be a non-negative number'),
});

/**
 * Schema for a job id path parameter
 */
export const JobIdParamSchema = v.pipe(
  v.string(),
  v.regex(/^[1-9]\d*$/, 'id must be a positive integer'),
  v.transform(Number)
);

// Inferred types from schemas
export type WebhookDeliveryPayloadInput = v.InferOutput<typeof WebhookDeliveryPayloadSchema>;
export type PathCleanupPayloadInput = v.InferOutput<typeof PathCleanupPayloadSchema>;
export type JobListQuery = v.InferOutput<typeof JobListQuerySchema>;
