import { readFileSync } from 'fs';
import { join } from 'path';
import { Pool, PoolConfig, QueryResult, QueryResultRow, types } from 'pg';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { DATABASE_POOL_CONFIG } from '@/config/database.config';

// DATE columns stay as 'YYYY-MM-DD' strings instead of local-midnight Date objects
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

function buildPoolConfig(): PoolConfig {
  const connection: PoolConfig = env.DATABASE_URI
    ? { connectionString: env.DATABASE_URI }
    : {
        host: env.DB_HOST,
        port: env.DB_PORT,
        database: env.DB_NAME,
        user: env.DB_USER,
        password: env.DB_PASSWORD,
      };

  return {
    ...connection,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : false,
    max: DATABASE_POOL_CONFIG.max,
    idleTimeoutMillis: DATABASE_POOL_CONFIG.idleTimeoutMillis,
    connectionTimeoutMillis: DATABASE_POOL_CONFIG.connectionTimeoutMillis,
    maxUses: DATABASE_POOL_CONFIG.maxUses,
  };
}

/**
 * PostgreSQL connection pool
 * No connection is opened until the first query
 */
const pool = new Pool(buildPoolConfig());

pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
});

pool.on('connect', (client) => {
  logger.debug('New PostgreSQL client connected to pool');

  client
    .query(`SET statement_timeout = ${DATABASE_POOL_CONFIG.statementTimeoutMillis}`)
    .catch((error: unknown) => {
      logger.error({ error }, 'Failed to set statement timeout');
    });
});

/**
 * Execute a SQL query with parameters
 * @param text - SQL query string
 * @param params - Positional parameters ($1, $2, ...)
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await pool.query<T>(text, params);

    logger.debug(
      {
        query: text,
        duration: Date.now() - start,
        rows: result.rowCount,
      },
      'Executed SQL query'
    );

    return result;
  } catch (error) {
    logger.error(
      {
        error,
        query: text,
        paramCount: params?.length ?? 0,
      },
      'Database query error'
    );
    throw error;
  }
}

/**
 * Create the accounts table if it doesn't exist yet
 */
export async function initSchema(): Promise<void> {
  const schemaPath = join(__dirname, '../../db/schema.sql');
  await query(readFileSync(schemaPath, 'utf8'));
  logger.info('Database schema ready');
}

/**
 * Test database connection
 * Used for startup validation
 */
export async function testConnection(): Promise<boolean> {
  try {
    const result = await query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ time: result.rows[0]?.now }, 'Database connection successful');
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    return false;
  }
}

/**
 * Close all connections in the pool
 * Called during graceful shutdown
 */
export async function closePool(): Promise<void> {
  await pool.end();
  logger.info('Database pool closed');
}
