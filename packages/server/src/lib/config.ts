import * as path from 'path';
import * as os from 'os';
import { randomUUID } from 'crypto';

/**
 * Get the configuration directory for the job queue.
 * Can be overridden with JOB_QUEUE_HOME environment variable.
 * Default: ~/.durable-jobs
 */
export function getConfigDir(): string {
  return process.env.JOB_QUEUE_HOME || path.join(os.homedir(), '.durable-jobs');
}

/**
 * Get the path of the SQLite database holding job records.
 * Structure: ~/.durable-jobs/jobs.db
 */
export function getDatabasePath(): string {
  return path.join(getConfigDir(), 'jobs.db');
}

let currentProcessIdentifier: string | null = null;

/**
 * Get the identifier of the current process for exclusive job records.
 * Taken from JOB_PROCESS_ID on first call, otherwise a random UUID.
 * Stable for the lifetime of the process.
 */
export function getCurrentProcessIdentifier(): string {
  if (!currentProcessIdentifier) {
    currentProcessIdentifier = process.env.JOB_PROCESS_ID || randomUUID();
  }
  return currentProcessIdentifier;
}
