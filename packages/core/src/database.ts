/**
 * Database Client Factory
 * Provides a simple database client interface for use with repositories
 *
 * Every fetcher acquires its own pooled connection through `withConnection`
 * and releases it when the query completes; no transaction spans fetchers.
 */

import pg from 'pg';
import { createLogger, redactSecrets, type Logger } from './logger.js';
import { DatabaseConnectionError, toError } from './errors.js';

/**
 * Database query result type
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Database client interface
 * Compatible with pg.Pool and pg.Client
 */
export interface DatabaseClient {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Database pool interface for connection management
 */
export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

/**
 * Pool client interface (acquired connection)
 */
export interface PoolClient extends DatabaseClient {
  release(): void;
}

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  ssl?: boolean;
}

/**
 * PostgreSQL database pool wrapper
 */
class PostgresPool implements DatabasePool {
  private pool: pg.Pool | null = null;
  private logger: Logger;

  constructor(private config: DatabaseConfig) {
    this.logger = createLogger({ name: 'database' });
  }

  private async initialize(): Promise<pg.Pool> {
    if (this.pool) return this.pool;

    const pool = new pg.Pool({
      connectionString: this.config.connectionString,
      max: this.config.maxConnections ?? 10,
      idleTimeoutMillis: this.config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: this.config.connectionTimeoutMs ?? 5000,
      ssl: this.config.ssl ? { rejectUnauthorized: process.env.NODE_ENV === 'production' } : undefined,
    });

    try {
      // Test connection
      const client = await pool.connect();
      client.release();
    } catch (error) {
      const err = toError(error);
      this.logger.error({ err }, 'Failed to initialize database pool');
      await pool.end().catch((endError: unknown) => {
        this.logger.warn({ err: toError(endError) }, 'Failed to dispose unusable pool');
      });
      throw new DatabaseConnectionError(redactSecrets(err.message));
    }

    this.pool = pool;
    this.logger.info({ ssl: Boolean(this.config.ssl) }, 'Database pool initialized');
    return pool;
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const pool = await this.initialize();
    const result = await pool.query(sql, params);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async connect(): Promise<PoolClient> {
    const pool = await this.initialize();
    const client = await pool.connect();

    return {
      query: async <T = Record<string, unknown>>(
        sql: string,
        params?: unknown[]
      ): Promise<QueryResult<T>> => {
        const result = await client.query(sql, params);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      release: () => client.release(),
    };
  }

  async end(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.logger.info('Database pool closed');
    }
  }
}

/**
 * Create a database pool; it connects on first use
 */
export function createIsolatedDatabaseClient(config: DatabaseConfig): DatabasePool {
  return new PostgresPool(config);
}

/**
 * Run `fn` on a dedicated pooled connection, releasing it afterwards
 *
 * @example
 * ```typescript
 * const totals = await withConnection(db, async (client) => {
 *   const { rows } = await client.query('SELECT code, final_qty FROM stock_data');
 *   return rows.length;
 * });
 * ```
 */
export async function withConnection<T>(
  pool: DatabasePool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}
