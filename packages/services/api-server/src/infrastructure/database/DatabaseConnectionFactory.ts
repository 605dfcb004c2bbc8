/**
 * API Server Database Connection Factory
 *
 * One pg pool per process, wrapped by Drizzle with the blob schema.
 */

import { readFile } from 'fs/promises';
import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { createLogger, DomainError, DomainErrorCode, errorMessage, toError } from '@bloxstack/platform-core';
import * as schema from '../../schema/blob-schema';

const logger = createLogger('api-server-database');

export type DatabaseSchema = typeof schema;
export type DatabaseConnection = NodePgDatabase<DatabaseSchema>;

export interface DatabaseHandle {
  pool: Pool;
  db: DatabaseConnection;
  close(): Promise<void>;
}

const SCHEMA_SQL_URL = new URL('../../../sql/create-blobs.sql', import.meta.url);

function getSslConfig(connectionString: string): false | { rejectUnauthorized: boolean } {
  if (process.env.DATABASE_SSL === 'false') {
    return false;
  }
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch (error) {
    throw DomainError.configurationError('BLOXSTACK_DATABASE_URL', 'not a valid URL', toError(error));
  }
  if (url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.searchParams.get('sslmode') === 'disable') {
    return false;
  }
  return { rejectUnauthorized: false };
}

export function createDatabaseConnection(connectionString: string): DatabaseHandle {
  const pool = new Pool({
    connectionString,
    max: process.env.NODE_ENV === 'production' ? 20 : 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    ssl: getSslConfig(connectionString),
  });
  pool.on('error', error => {
    logger.error('Idle database client failed', { error: error.message });
  });

  const db = drizzle(pool, { schema });
  logger.debug('SQL connection pool established');

  return {
    pool,
    db,
    close: () => pool.end(),
  };
}

/**
 * Creates the blobs table when it is missing. Safe to run on every start.
 */
export async function ensureBlobSchema(pool: Pick<Pool, 'query'>): Promise<void> {
  const ddl = await readFile(SCHEMA_SQL_URL, 'utf8');
  try {
    await pool.query(ddl);
  } catch (error) {
    logger.error('Failed to ensure blob schema', { error: errorMessage(error) });
    throw new DomainError('failed to ensure blob schema', 500, toError(error), DomainErrorCode.DATABASE_ERROR);
  }
  logger.debug('Blob schema ready');
}
