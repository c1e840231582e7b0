// =============================================================================
// PostgreSQL connection plumbing
// =============================================================================

import { Pool, QueryResult, QueryResultRow } from 'pg';
import { StorageError, errorMessage } from '../errors';
import type { DatabaseConfig } from '../config/default';

// =============================================================================
// Types
// =============================================================================

export interface SqlClient {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

/** A checked-out connection; transactions run on one session. */
export interface SqlSession extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlSession>;
  end(): Promise<void>;
}

// Connection loss, server shutdown, too many connections, serialization / deadlock, lock timeout
const TRANSIENT_PG_CODES = new Set([
  '08000', '08003', '08006', '08001', '08004',
  '57P01', '57P03', '53300',
  '40001', '40P01', '55P03',
]);

const TRANSIENT_NET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT']);

// =============================================================================
// Pool
// =============================================================================

export function createPool(config: DatabaseConfig, max: number = config.poolSize): SqlPool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
    max,
    idleTimeoutMillis: config.idleTimeout,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', error => {
    console.error('[Database] Idle client error:', error.message);
  });

  return {
    query: <R extends QueryResultRow>(text: string, values?: unknown[]) => pool.query<R>(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: <R extends QueryResultRow>(text: string, values?: unknown[]) => client.query<R>(text, values),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

// =============================================================================
// Errors & transactions
// =============================================================================

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isTransientPgError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && (TRANSIENT_PG_CODES.has(code) || TRANSIENT_NET_CODES.has(code));
}

/**
 * Maps connection, lock and serialization failures to a transient
 * StorageError. Anything else (including AppErrors raised inside a
 * transaction) passes through untouched.
 */
export function toStorageError(error: unknown): unknown {
  if (error instanceof StorageError || !isTransientPgError(error)) return error;
  return new StorageError(`Database unavailable: ${errorMessage(error)}`, { transient: true, cause: error });
}

/**
 * Runs `work` inside BEGIN / COMMIT on one session, rolling back on any
 * error. The session is always released.
 */
export async function withTransaction<T>(pool: SqlPool, work: (session: SqlSession) => Promise<T>): Promise<T> {
  let session: SqlSession;
  try {
    session = await pool.connect();
  } catch (error) {
    throw toStorageError(error);
  }

  try {
    await session.query('BEGIN');
    const result = await work(session);
    await session.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await session.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('[Database] Rollback failed:', errorMessage(rollbackError));
    }
    throw toStorageError(error);
  } finally {
    session.release();
  }
}
