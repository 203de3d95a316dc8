import * as fs from 'fs/promises';
import {
  JOB_LABELS,
  PathCleanupPayloadSchema,
  type PathCleanupPayloadInput,
} from '@durable-jobs/shared';
import { createLogger } from '../lib/logger.js';
import { DurableOperation } from './durable-operation.js';
import type { JobRecord } from './job-record.js';
import { parseJobPayload, type JobType } from './job-type.js';

const logger = createLogger('path-cleanup-job');

/**
 * Remove a file or directory. A path that is already gone counts as removed.
 */
export class PathCleanupOperation extends DurableOperation {
  constructor(
    jobRecord: JobRecord,
    private readonly payload: PathCleanupPayloadInput
  ) {
    super(jobRecord);
  }

  protected async run(): Promise<void> {
    const { path } = this.payload;
    logger.debug({ jobId: this.jobRecord.id, path }, 'Executing cleanup:path job');
    try {
      await fs.rm(path, { recursive: true });
      logger.info({ jobId: this.jobRecord.id, path }, 'Path cleanup completed');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.debug({ jobId: this.jobRecord.id, path }, 'Path does not exist, skipping cleanup');
        return;
      }
      throw error;
    }
  }
}

export const pathCleanupJobType: JobType<PathCleanupPayloadInput> = {
  label: JOB_LABELS.CLEANUP_PATH,
  maxRetries: 3,
  requiresInternet: false,
  maxConcurrentOperations: 1,
  payloadSchema: PathCleanupPayloadSchema,
  buildOperation(record) {
    return new PathCleanupOperation(record, parseJobPayload(record, PathCleanupPayloadSchema));
  },
  async didMarkAsReady(record) {
    logger.info({ jobId: record.id }, 'Cleanup job reset after restart');
  },
};
