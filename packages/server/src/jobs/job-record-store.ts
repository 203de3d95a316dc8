import { JOB_STATUS, type JobStats, type JobStatus } from '@durable-jobs/shared';
import type { ReadTransaction, WriteTransaction } from '../database/storage.js';
import type { JobRecordRowUpdate } from '../database/schema.js';
import { toJobRecord, toJobStatus } from '../database/mappers.js';
import type { JobRecord } from './job-record.js';
import { InvalidJobTransitionError } from './job-errors.js';

/**
 * Parameters for inserting a job record.
 */
export interface InsertJobRecordParams {
  label: string;
  /** Serialized with JSON.stringify */
  payload: unknown;
  /** Restrict the record to one process. Default: any process */
  exclusiveProcessIdentifier?: string | null;
}

/**
 * Options for listing job records.
 */
export interface JobRecordFilter {
  label?: string;
  status?: JobStatus;
  /** Maximum number of records to return. Default: 50 */
  limit?: number;
  /** Number of records to skip. Default: 0 */
  offset?: number;
}

/**
 * Queries and mutations over persisted job records.
 *
 * Every method runs inside a transaction supplied by the caller; the store
 * never opens one. Status transitions are guarded by the expected current
 * status and throw InvalidJobTransitionError when the guard does not match.
 */
export class JobRecordStore {
  async insert(tx: WriteTransaction, params: InsertJobRecordParams): Promise<JobRecord> {
    const now = Date.now();
    const row = await tx.db
      .insertInto('job_records')
      .values({
        label: params.label,
        status: JOB_STATUS.READY,
        exclusive_process_identifier: params.exclusiveProcessIdentifier ?? null,
        payload: JSON.stringify(params.payload),
        created_at: now,
        updated_at: now,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toJobRecord(row);
  }

  async find(tx: ReadTransaction, id: number): Promise<JobRecord | null> {
    const row = await tx.db
      .selectFrom('job_records')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();

    return row ? toJobRecord(row) : null;
  }

  /**
   * The lowest-id ready record for the label that the given process may run.
   * Records reserved for another process are never returned.
   */
  async nextReady(
    tx: ReadTransaction,
    label: string,
    processIdentifier: string
  ): Promise<JobRecord | null> {
    const row = await tx.db
      .selectFrom('job_records')
      .selectAll()
      .where('label', '=', label)
      .where('status', '=', JOB_STATUS.READY)
      .where((eb) =>
        eb.or([
          eb('exclusive_process_identifier', 'is', null),
          eb('exclusive_process_identifier', '=', processIdentifier),
        ])
      )
      .orderBy('id', 'asc')
      .limit(1)
      .executeTakeFirst();

    return row ? toJobRecord(row) : null;
  }

  /**
   * All records for the label in the given status, in id order.
   */
  async all(tx: ReadTransaction, label: string, status: JobStatus): Promise<JobRecord[]> {
    const rows = await tx.db
      .selectFrom('job_records')
      .selectAll()
      .where('label', '=', label)
      .where('status', '=', status)
      .orderBy('id', 'asc')
      .execute();

    return rows.map(toJobRecord);
  }

  /**
   * Records for the label that will never run in this process: terminal
   * records (including unrecognized statuses) and ready records reserved
   * for a different process.
   */
  async staleRecords(
    tx: ReadTransaction,
    label: string,
    processIdentifier: string
  ): Promise<JobRecord[]> {
    const rows = await tx.db
      .selectFrom('job_records')
      .selectAll()
      .where('label', '=', label)
      .where((eb) =>
        eb.or([
          eb('status', 'not in', [JOB_STATUS.READY, JOB_STATUS.RUNNING]),
          eb.and([
            eb('status', '=', JOB_STATUS.READY),
            eb('exclusive_process_identifier', 'is not', null),
            eb('exclusive_process_identifier', '!=', processIdentifier),
          ]),
        ])
      )
      .orderBy('id', 'asc')
      .execute();

    return rows.map(toJobRecord);
  }

  async saveReadyAsRunning(tx: WriteTransaction, record: JobRecord): Promise<JobRecord> {
    return this.transition(tx, record, JOB_STATUS.READY, JOB_STATUS.RUNNING);
  }

  async saveRunningAsReady(tx: WriteTransaction, record: JobRecord): Promise<JobRecord> {
    return this.transition(tx, record, JOB_STATUS.RUNNING, JOB_STATUS.READY);
  }

  /**
   * Record one retryable failure. The record stays running.
   */
  async addFailure(tx: WriteTransaction, record: JobRecord, lastError: string): Promise<JobRecord> {
    const now = Date.now();
    const result = await tx.db
      .updateTable('job_records')
      .set((eb) => ({
        failure_count: eb('failure_count', '+', 1),
        last_error: lastError,
        updated_at: now,
      }))
      .where('id', '=', record.id)
      .where('status', '=', JOB_STATUS.RUNNING)
      .executeTakeFirst();

    if (result.numUpdatedRows === 0n) {
      throw new InvalidJobTransitionError(record.id, JOB_STATUS.RUNNING, JOB_STATUS.RUNNING);
    }
    return {
      ...record,
      failureCount: record.failureCount + 1,
      lastError,
      updatedAt: now,
    };
  }

  async saveAsPermanentlyFailed(
    tx: WriteTransaction,
    record: JobRecord,
    lastError?: string
  ): Promise<JobRecord> {
    return this.transition(tx, record, JOB_STATUS.RUNNING, JOB_STATUS.PERMANENTLY_FAILED, lastError);
  }

  async saveAsObsolete(tx: WriteTransaction, record: JobRecord, lastError?: string): Promise<JobRecord> {
    return this.transition(tx, record, JOB_STATUS.RUNNING, JOB_STATUS.OBSOLETE, lastError);
  }

  /**
   * Delete a running record (its work is done).
   */
  async remove(tx: WriteTransaction, record: JobRecord): Promise<void> {
    const result = await tx.db
      .deleteFrom('job_records')
      .where('id', '=', record.id)
      .where('status', '=', JOB_STATUS.RUNNING)
      .executeTakeFirst();

    if (result.numDeletedRows === 0n) {
      throw new InvalidJobTransitionError(record.id, JOB_STATUS.RUNNING, 'deleted');
    }
  }

  /**
   * Delete records by id regardless of status. Used for pruning.
   * @returns Number of deleted records
   */
  async removeAll(tx: WriteTransaction, ids: number[]): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }
    const result = await tx.db.deleteFrom('job_records').where('id', 'in', ids).executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  // ===========================================================================
  // Management
  // ===========================================================================

  /**
   * List records, newest first.
   */
  async list(tx: ReadTransaction, filter: JobRecordFilter = {}): Promise<JobRecord[]> {
    let query = tx.db.selectFrom('job_records').selectAll();
    if (filter.label) {
      query = query.where('label', '=', filter.label);
    }
    if (filter.status) {
      query = query.where('status', '=', filter.status);
    }

    const rows = await query
      .orderBy('id', 'desc')
      .limit(filter.limit ?? 50)
      .offset(filter.offset ?? 0)
      .execute();

    return rows.map(toJobRecord);
  }

  /**
   * Count records matching the filter (limit and offset are ignored).
   */
  async count(tx: ReadTransaction, filter: Pick<JobRecordFilter, 'label' | 'status'> = {}): Promise<number> {
    let query = tx.db
      .selectFrom('job_records')
      .select((eb) => eb.fn.countAll<number>().as('count'));
    if (filter.label) {
      query = query.where('label', '=', filter.label);
    }
    if (filter.status) {
      query = query.where('status', '=', filter.status);
    }

    const result = await query.executeTakeFirstOrThrow();
    return Number(result.count);
  }

  /**
   * Count records by status. Unrecognized statuses are counted as unknown.
   */
  async stats(tx: ReadTransaction): Promise<JobStats> {
    const rows = await tx.db
      .selectFrom('job_records')
      .select(['status', (eb) => eb.fn.countAll<number>().as('count')])
      .groupBy('status')
      .execute();

    const stats: JobStats = {
      ready: 0,
      running: 0,
      permanentlyFailed: 0,
      obsolete: 0,
      unknown: 0,
    };
    for (const row of rows) {
      stats[toJobStatus(row.status)] += Number(row.count);
    }
    return stats;
  }

  /**
   * Move a permanently failed record back to ready with a fresh retry budget.
   * @returns The updated record, or null if no permanently failed record has this id
   */
  async resetPermanentlyFailed(tx: WriteTransaction, id: number): Promise<JobRecord | null> {
    const row = await tx.db
      .updateTable('job_records')
      .set({
        status: JOB_STATUS.READY,
        failure_count: 0,
        last_error: null,
        updated_at: Date.now(),
      })
      .where('id', '=', id)
      .where('status', '=', JOB_STATUS.PERMANENTLY_FAILED)
      .returningAll()
      .executeTakeFirst();

    return row ? toJobRecord(row) : null;
  }

  /**
   * Delete a record that no operation is holding.
   * @returns true if the record was deleted
   */
  async removeUnlessRunning(tx: WriteTransaction, id: number): Promise<boolean> {
    const result = await tx.db
      .deleteFrom('job_records')
      .where('id', '=', id)
      .where('status', '!=', JOB_STATUS.RUNNING)
      .executeTakeFirst();

    return result.numDeletedRows > 0n;
  }

  private async transition(
    tx: WriteTransaction,
    record: JobRecord,
    from: JobStatus,
    to: JobStatus,
    lastError?: string
  ): Promise<JobRecord> {
    const now = Date.now();
    const update: JobRecordRowUpdate = { status: to, updated_at: now };
    if (lastError !== undefined) {
      update.last_error = lastError;
    }

    const result = await tx.db
      .updateTable('job_records')
      .set(update)
      .where('id', '=', record.id)
      .where('status', '=', from)
      .executeTakeFirst();

    if (result.numUpdatedRows === 0n) {
      throw new InvalidJobTransitionError(record.id, from, to);
    }
    return {
      ...record,
      status: to,
      lastError: lastError ?? record.lastError,
      updatedAt: now,
    };
  }
}
