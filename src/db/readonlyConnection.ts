/**
 * Read-only database connection for the segmentation record source.
 *
 * Uses a separate PostgreSQL user with SELECT-only privileges. Every pooled
 * session gets `statement_timeout` set, 30 s unless the caller overrides it.
 */

import knex, { type Knex } from 'knex';
import { logger } from '../utils/logger.js';

export const DEFAULT_STATEMENT_TIMEOUT_MS = 30000;
const POOL_MIN = 1;
const POOL_MAX = 5;

export interface ReadonlyDbOptions {
  statementTimeoutMs?: number;
}

export function createReadonlyDb(connectionUrl: string, options: ReadonlyDbOptions = {}): Knex {
  const statementTimeoutMs = options.statementTimeoutMs ?? DEFAULT_STATEMENT_TIMEOUT_MS;
  if (!Number.isInteger(statementTimeoutMs) || statementTimeoutMs <= 0) {
    throw new Error(`Invalid statement timeout ${statementTimeoutMs}: must be a positive integer`);
  }

  const db = knex({
    client: 'pg',
    connection: connectionUrl,
    pool: {
      min: POOL_MIN,
      max: POOL_MAX,
      afterCreate(
        conn: { query: (sql: string, cb: (err: Error | null) => void) => void },
        done: (err: Error | null, conn: unknown) => void,
      ) {
        conn.query(
          `SET statement_timeout = ${statementTimeoutMs}`,
          (err: Error | null) => {
            done(err, conn);
          },
        );
      },
    },
  });

  logger.info(
    { poolMin: POOL_MIN, poolMax: POOL_MAX, statementTimeoutMs },
    'Read-only database connection pool created',
  );

  return db;
}
