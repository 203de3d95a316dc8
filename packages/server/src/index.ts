import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { pinoLogger } from 'hono-pino';
import { api } from './routes/api.js';
import { onApiError } from './lib/error-handler.js';
import { serverConfig } from './lib/server-config.js';
import { rootLogger, createLogger } from './lib/logger.js';
import { getCurrentProcessIdentifier, getDatabasePath } from './lib/config.js';
import { AppReadiness } from './lib/app-readiness.js';
import { ReachabilityManager } from './lib/reachability.js';
import { initializeDatabase, closeDatabase } from './database/connection.js';
import { DatabaseStorage } from './database/storage.js';
import {
  JobTypeRegistry,
  initializeJobQueues,
  registerJobTypes,
  resetJobQueues,
} from './jobs/index.js';

const logger = createLogger('server');

logger.info({ pid: process.pid }, 'Server process starting');

/**
 * Graceful shutdown: stop job queues and close database.
 * Operations still running are recovered on the next startup.
 */
async function shutdown(): Promise<void> {
  await resetJobQueues();
  await closeDatabase();
}

// Global error handlers to log crashes before process exits
process.on('uncaughtException', async (error) => {
  logger.fatal({ pid: process.pid, err: error }, 'Uncaught Exception');
  try {
    await shutdown();
  } catch (shutdownError) {
    logger.error({ err: shutdownError }, 'Error during shutdown after uncaught exception');
  }
  process.exit(1);
});

process.on('unhandledRejection', async (reason) => {
  logger.fatal({ pid: process.pid, reason }, 'Unhandled Rejection');
  try {
    await shutdown();
  } catch (shutdownError) {
    logger.error({ err: shutdownError }, 'Error during shutdown after unhandled rejection');
  }
  process.exit(1);
});

process.on('SIGTERM', async () => {
  logger.info({ pid: process.pid }, 'Server received SIGTERM');
  await shutdown();
  process.exit(0);
});

process.on('SIGINT', async () => {
  logger.info({ pid: process.pid }, 'Server received SIGINT');
  await shutdown();
  process.exit(0);
});

const app = new Hono();

app.onError(onApiError);

// HTTP request logging middleware
app.use(
  '*',
  pinoLogger({
    pino: rootLogger.child({ service: 'http' }),
  })
);

app.get('/health', (c) => {
  return c.json({ status: 'ok' });
});

app.route('/api', api);

const PORT = Number(serverConfig.PORT);

const database = await initializeDatabase().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to initialize database');
  console.error('\nDATABASE INITIALIZATION FAILED\n');
  console.error('To reset the database, delete the file:');
  console.error(`  rm ${getDatabasePath()}\n`);
  process.exit(1);
});
logger.info('Database initialized successfully');

const readiness = new AppReadiness();
const reachability = new ReachabilityManager();

const registry = new JobTypeRegistry();
registerJobTypes(registry, { reachability });

const jobQueues = initializeJobQueues({
  registry,
  storage: new DatabaseStorage(database),
  readiness,
  reachability,
  processIdentifier: getCurrentProcessIdentifier(),
  isPrimaryProcess: serverConfig.JOB_PRIMARY_PROCESS,
});

try {
  await jobQueues.setup();
} catch (error) {
  logger.fatal({ err: error }, 'Failed to set up job queues');
  process.exit(1);
}

logger.info(
  { port: PORT, env: serverConfig.NODE_ENV ?? 'development', pid: process.pid },
  'Server starting'
);

serve({ fetch: app.fetch, port: PORT, hostname: serverConfig.HOST }, (info) => {
  logger.info({ port: info.port }, 'Server listening');
  readiness.setAppIsReady();
});
