import type { Generated, Insertable, Selectable, Updateable } from 'kysely';

/**
 * Database table definitions for Kysely.
 * Represents the SQLite database schema.
 */
export interface Database {
  job_records: JobRecordsTable;
}

/**
 * Job records table schema.
 *
 * Every job type shares this table. The identity and retry columns are
 * owned by the queue; `payload` is a JSON document owned by the job type
 * named in `label`.
 */
export interface JobRecordsTable {
  /** Primary key - monotonically increasing, never reused (AUTOINCREMENT) */
  id: Generated<number>;
  /** Job type label, e.g. 'webhook:deliver' */
  label: string;
  /**
   * Lifecycle status. Stored as free text so that values written by a
   * newer schema can still be read back (as 'unknown').
   */
  status: string;
  /** Number of retryable failures recorded so far */
  failure_count: Generated<number>;
  /** Process allowed to run this record (null: any process) */
  exclusive_process_identifier: string | null;
  /** JSON-serialized job type payload */
  payload: string;
  /** Message of the most recent failure */
  last_error: string | null;
  /** Creation timestamp (epoch milliseconds) */
  created_at: number;
  /** Last status or failure count change (epoch milliseconds) */
  updated_at: number;
}

/** Job record row as returned from SELECT queries */
export type JobRecordRow = Selectable<JobRecordsTable>;
/** Job record data for INSERT queries */
export type NewJobRecordRow = Insertable<JobRecordsTable>;
/** Job record data for UPDATE queries */
export type JobRecordRowUpdate = Updateable<JobRecordsTable>;
