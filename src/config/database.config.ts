/**
 * Database Connection Pool Configuration
 *
 * PostgreSQL pool settings. See https://node-postgres.com/apis/pool
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Upper bound on open connections per process
   * PostgreSQL defaults to max_connections = 100, so 20 leaves room for a
   * few app instances plus admin sessions.
   */
  max: env.DB_MAX_CONNECTIONS,

  /**
   * Idle connections are closed after 5 minutes
   */
  idleTimeoutMillis: 300_000,

  /**
   * Fail a checkout that waits longer than 10 seconds for a free connection
   */
  connectionTimeoutMillis: 10_000,

  /**
   * Recycle a connection after this many queries
   */
  maxUses: 7_500,

  /**
   * Applied with SET statement_timeout on every new connection
   */
  statementTimeoutMillis: 10_000,
} as const;
