/**
 * Centralized server-specific environment configuration.
 *
 * All environment variables read by the server are defined here.
 * This serves as a single source of truth for configuration.
 */
export const serverConfig = {
  /** Server's environment mode (development/production/test) */
  NODE_ENV: process.env.NODE_ENV,
  /** Management API port binding */
  PORT: process.env.PORT || '3458',
  /** Management API host binding (defaults to localhost for security) */
  HOST: process.env.HOST || 'localhost',
  /** Log level (trace, debug, info, warn, error, fatal) */
  LOG_LEVEL: process.env.LOG_LEVEL,
  /**
   * Whether this process recovers and prunes job records at startup.
   * Secondary processes sharing the same database should set this to 'false'.
   */
  JOB_PRIMARY_PROCESS: process.env.JOB_PRIMARY_PROCESS !== 'false',
} as const;

/** Type for server configuration */
export type ServerConfig = typeof serverConfig;
