import { Kysely, SqliteDialect, sql } from 'kysely';
import SQLite from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import type { Database } from './schema.js';
import { getDatabasePath } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('database');

let db: Kysely<Database> | null = null;

/**
 * Promise-based mutex to ensure database is initialized only once.
 * Protects against race conditions when multiple calls happen concurrently.
 */
let initializationPromise: Promise<Kysely<Database>> | null = null;

/**
 * Get the database instance.
 * @throws Error if database is not initialized
 */
export function getDatabase(): Kysely<Database> {
  if (!db) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return db;
}

/**
 * Initialize the shared SQLite database.
 * Creates the database file if it doesn't exist and runs migrations.
 * Uses a Promise-based mutex to prevent race conditions from concurrent calls.
 * @param dbPath - Database path. Use ':memory:' for an in-memory database (tests).
 * @returns The initialized Kysely database instance
 */
export async function initializeDatabase(dbPath: string = getDatabasePath()): Promise<Kysely<Database>> {
  // Fast path: return existing instance
  if (db) return db;

  // If initialization is already in progress, wait for it
  if (initializationPromise) {
    return initializationPromise;
  }

  initializationPromise = openDatabase(dbPath);

  try {
    db = await initializationPromise;
    return db;
  } finally {
    // Clear the promise after completion (success or failure)
    // This allows retry on next call if initialization failed
    initializationPromise = null;
  }
}

/**
 * Open a database connection and bring its schema up to date.
 *
 * Unlike initializeDatabase(), every call returns a new connection. Tests use
 * this to simulate several processes (or a restarted process) on one file.
 */
export async function openDatabase(dbPath: string): Promise<Kysely<Database>> {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  logger.info({ dbPath }, 'Opening SQLite database');

  const sqlite = new SQLite(dbPath);
  // WAL lets readers proceed while another process holds the write lock
  sqlite.pragma('journal_mode = WAL');
  // Wait for the other process instead of failing with SQLITE_BUSY
  sqlite.pragma('busy_timeout = 5000');

  const database = new Kysely<Database>({
    dialect: new SqliteDialect({ database: sqlite }),
  });

  try {
    await runMigrations(database);
  } catch (error) {
    await database.destroy();
    throw error;
  }

  return database;
}

/**
 * Close the shared database connection.
 * Should be called during server shutdown.
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    logger.info('Database connection closed');
  }
}

/**
 * Run database migrations based on PRAGMA user_version.
 * Each migration increments the version number.
 */
async function runMigrations(database: Kysely<Database>): Promise<void> {
  const result = await sql<{ user_version: number }>`PRAGMA user_version`.execute(database);
  const currentVersion = result.rows[0]?.user_version ?? 0;

  logger.debug({ currentVersion }, 'Current database schema version');

  if (currentVersion < 1) {
    await migrateToV1(database);
  }
}

/**
 * Migration v1: Create the job_records table.
 */
async function migrateToV1(database: Kysely<Database>): Promise<void> {
  logger.info('Running migration to v1: Creating job_records table');

  await database.schema
    .createTable('job_records')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('label', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('failure_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('exclusive_process_identifier', 'text')
    .addColumn('payload', 'text', (col) => col.notNull())
    .addColumn('last_error', 'text')
    .addColumn('created_at', 'integer', (col) => col.notNull())
    .addColumn('updated_at', 'integer', (col) => col.notNull())
    .execute();

  // Claim and bulk queries filter by label and status, ordered by id
  await database.schema
    .createIndex('idx_job_records_label_status_id')
    .ifNotExists()
    .on('job_records')
    .columns(['label', 'status', 'id'])
    .execute();

  await sql`PRAGMA user_version = 1`.execute(database);

  logger.info('Migration to v1 completed');
}
