import { sql, type Kysely } from 'kysely';
import type { Database } from './schema.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('storage');

/**
 * A block that runs inside the write transaction, right before commit.
 */
export type FinalizationBlock = (tx: WriteTransaction) => Promise<void>;

/**
 * A block that runs after the write transaction has committed.
 */
export type CompletionBlock = () => void;

/**
 * Read access to the job database inside a transaction.
 */
export interface ReadTransaction {
  readonly db: Kysely<Database>;
}

/**
 * Write access to the job database inside a transaction, plus hooks that
 * run around the commit.
 *
 * Completion blocks are discarded when the transaction rolls back.
 */
export class WriteTransaction implements ReadTransaction {
  private finalizationBlocks = new Map<string, FinalizationBlock>();
  private syncCompletions: CompletionBlock[] = [];
  private asyncCompletions: CompletionBlock[] = [];

  constructor(readonly db: Kysely<Database>) {}

  /**
   * Run a block inside this transaction just before it commits.
   * Only the first block registered under a key is kept.
   */
  addFinalizationBlock(key: string, block: FinalizationBlock): void {
    if (this.finalizationBlocks.has(key)) {
      return;
    }
    this.finalizationBlocks.set(key, block);
  }

  /**
   * Run a block right after commit, before the write() call resolves.
   */
  addSyncCompletion(block: CompletionBlock): void {
    this.syncCompletions.push(block);
  }

  /**
   * Run a block after commit on a later turn of the event loop.
   */
  addAsyncCompletion(block: CompletionBlock): void {
    this.asyncCompletions.push(block);
  }

  /** @internal */
  async runFinalizationBlocks(): Promise<void> {
    const done = new Set<string>();
    // Finalization blocks may register further blocks
    for (;;) {
      const next = [...this.finalizationBlocks].find(([key]) => !done.has(key));
      if (!next) {
        return;
      }
      const [key, block] = next;
      done.add(key);
      await block(this);
    }
  }

  /** @internal */
  runCompletions(): void {
    for (const block of this.syncCompletions) {
      runCompletion(block);
    }
    for (const block of this.asyncCompletions) {
      setImmediate(() => runCompletion(block));
    }
  }
}

function runCompletion(block: CompletionBlock): void {
  try {
    block();
  } catch (error) {
    logger.error({ err: error }, 'Transaction completion block failed');
  }
}

/**
 * Transactional access to the job database.
 *
 * Kysely's SQLite driver holds a single connection behind a mutex, so
 * transactions opened through one DatabaseStorage run one at a time.
 * Write transactions begin with BEGIN IMMEDIATE: a process sharing the
 * same file waits for the write lock (busy_timeout) before it reads, so
 * it never reads a ready record another process is about to claim.
 *
 * Never open a transaction from inside another one on the same storage:
 * the inner call waits for the connection the outer one holds.
 */
export class DatabaseStorage {
  constructor(private readonly database: Kysely<Database>) {}

  /**
   * Run a block inside a read transaction.
   */
  async read<T>(block: (tx: ReadTransaction) => Promise<T>): Promise<T> {
    return this.database.transaction().execute((trx) => block({ db: trx }));
  }

  /**
   * Run a block inside a write transaction.
   * Finalization blocks run before commit; completion blocks after it.
   */
  async write<T>(block: (tx: WriteTransaction) => Promise<T>): Promise<T> {
    const { result, tx } = await this.database.connection().execute(async (connection) => {
      await sql`begin immediate`.execute(connection);
      try {
        const tx = new WriteTransaction(connection);
        const result = await block(tx);
        await tx.runFinalizationBlocks();
        await sql`commit`.execute(connection);
        return { result, tx };
      } catch (error) {
        await rollback(connection);
        throw error;
      }
    });
    tx.runCompletions();
    return result;
  }
}

async function rollback(connection: Kysely<Database>): Promise<void> {
  try {
    await sql`rollback`.execute(connection);
  } catch (rollbackError) {
    // SQLite may already have rolled back (e.g. a failed commit)
    logger.warn({ err: rollbackError }, 'Rollback failed');
  }
}
