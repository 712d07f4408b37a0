/**
 * PostgreSQL source of truth.
 *
 * Thin QueryExecutor over a pg Pool. Mutations run as single statements, so
 * `execute` resolves only after the statement has committed.
 */

import { Pool, PoolConfig } from 'pg';
import { SourceExecutor, SourceQuery, SourceRow } from './types';
import { logger } from '../observability/logger';

const DB_CONNECTION_TIMEOUT_MS = 10_000;
const DB_IDLE_TIMEOUT_MS = 30_000;

export function createPgPool(connectionString: string, max: number): Pool {
  const config: PoolConfig = {
    connectionString,
    max,
    connectionTimeoutMillis: DB_CONNECTION_TIMEOUT_MS,
    idleTimeoutMillis: DB_IDLE_TIMEOUT_MS,
    keepAlive: true,
  };
  return new Pool(config);
}

export class PgQueryExecutor implements SourceExecutor {
  private readonly log = logger.child({ component: 'source-pg' });

  constructor(private readonly pool: Pool) {}

  async query<Row extends SourceRow>(query: SourceQuery): Promise<Row[]> {
    try {
      const result = await this.pool.query<Row>(query.text, query.values);
      return result.rows;
    } catch (err) {
      this.log.error({ err, sql: query.text }, 'Source query failed');
      throw err;
    }
  }

  async execute(query: SourceQuery): Promise<number> {
    try {
      const result = await this.pool.query(query.text, query.values);
      return result.rowCount ?? 0;
    } catch (err) {
      this.log.error({ err, sql: query.text }, 'Source mutation failed');
      throw err;
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.log.info('Source pool closed');
  }
}
