// Job schemas
export {
  WebhookDeliveryPayloadSchema,
  PathCleanupPayloadSchema,
  JobListQuerySchema,
  JobIdParamSchema,
  type WebhookDeliveryPayloadInput,
  type PathCleanupPayloadInput,
  type JobListQuery,
} from './job.js';
