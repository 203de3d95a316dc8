import { Hono } from 'hono';
import {
  JobIdParamSchema,
  JobListQuerySchema,
  type Job,
  type JobPayloadParseError,
  type JobsResponse,
} from '@durable-jobs/shared';
import { ConflictError, NotFoundError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { validateInput } from '../middleware/validation.js';
import { getDatabase } from '../database/connection.js';
import { DatabaseStorage } from '../database/storage.js';
import { JobRecordStore, getJobQueues, isJobQueuesInitialized, type JobRecord } from '../jobs/index.js';

const logger = createLogger('api:jobs');

const store = new JobRecordStore();

function getStorage(): DatabaseStorage {
  return new DatabaseStorage(getDatabase());
}

/**
 * Convert a job record to its API shape, parsing the payload JSON.
 */
function toJobResponse(record: JobRecord): Job {
  let payload: unknown;
  try {
    payload = JSON.parse(record.payload);
  } catch (error) {
    logger.warn({ jobId: record.id, err: error }, 'Failed to parse job payload');
    payload = { _parseError: true, raw: record.payload } satisfies JobPayloadParseError;
  }

  return {
    id: record.id,
    label: record.label,
    payload,
    status: record.status,
    failureCount: record.failureCount,
    exclusiveProcessIdentifier: record.exclusiveProcessIdentifier,
    lastError: record.lastError,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

const jobs = new Hono()
  // List jobs, newest first
  .get('/', async (c) => {
    const query = validateInput(JobListQuerySchema, c.req.query());

    const { records, total } = await getStorage().read(async (tx) => ({
      records: await store.list(tx, query),
      total: await store.count(tx, { label: query.label, status: query.status }),
    }));

    return c.json({ jobs: records.map(toJobResponse), total } satisfies JobsResponse);
  })
  .get('/stats', async (c) => {
    const stats = await getStorage().read((tx) => store.stats(tx));
    return c.json(stats);
  })
  .get('/:id', async (c) => {
    const id = validateInput(JobIdParamSchema, c.req.param('id'));
    const record = await getStorage().read((tx) => store.find(tx, id));
    if (!record) {
      throw new NotFoundError('Job');
    }
    return c.json(toJobResponse(record));
  })
  // Move a permanently failed job back to ready
  .post('/:id/retry', async (c) => {
    const id = validateInput(JobIdParamSchema, c.req.param('id'));

    const result = await getStorage().write(async (tx) => {
      const record = await store.resetPermanentlyFailed(tx, id);
      // Look the record up in the same transaction for an accurate error
      return { record, existing: record ? null : await store.find(tx, id) };
    });

    if (!result.record) {
      if (!result.existing) {
        throw new NotFoundError('Job');
      }
      throw new ConflictError('Only permanently failed jobs can be retried');
    }

    const { label } = result.record;
    if (isJobQueuesInitialized() && getJobQueues().has(label)) {
      getJobQueues().get(label).signalWork();
    }
    logger.info({ jobId: id, label }, 'Job manually retried');

    return c.json(toJobResponse(result.record));
  })
  // Delete a job that is not running
  .delete('/:id', async (c) => {
    const id = validateInput(JobIdParamSchema, c.req.param('id'));

    const result = await getStorage().write(async (tx) => {
      const deleted = await store.removeUnlessRunning(tx, id);
      return { deleted, existing: deleted ? null : await store.find(tx, id) };
    });

    if (!result.deleted) {
      if (!result.existing) {
        throw new NotFoundError('Job');
      }
      throw new ConflictError('Running jobs cannot be deleted');
    }

    logger.info({ jobId: id }, 'Job deleted');
    return c.json({ success: true });
  });

export { jobs };
