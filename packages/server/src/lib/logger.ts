import pino from 'pino';
import { serverConfig } from './server-config.js';

const isDev = serverConfig.NODE_ENV !== 'production';
const isTest = serverConfig.NODE_ENV === 'test';

/**
 * Root logger instance configured based on environment.
 * - Development: Pretty printed output with colors
 * - Production: JSON output for machine parsing
 * - Test: silent unless LOG_LEVEL is set
 */
export const rootLogger = pino({
  level: serverConfig.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport: isDev && !isTest
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

/**
 * Create a child logger for a specific service.
 * @param service - The service name to include in all log entries
 */
export const createLogger = (service: string) => rootLogger.child({ service });
