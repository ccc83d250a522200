import pgPromise from 'pg-promise';
import { StorageUnavailableError, errorMessage } from './errors.js';

const pgp = pgPromise();

export function createDb(databaseUrl?: string) {
  const url = databaseUrl ?? process.env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL not set');
  }
  return pgp(url);
}

export type Db = ReturnType<typeof createDb>;

/** Anything queries can run against: the database itself or an open transaction. */
export type Queryable = pgPromise.IBaseProtocol<{}>;

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE', 'EAI_AGAIN']);

export function isConnectionError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string') {
    const code = error.code;
    // SQLSTATE 08xxx connection exception, 53xxx insufficient resources, 57Pxx operator intervention
    if (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08') || code.startsWith('53') || code.startsWith('57P')) {
      return true;
    }
  }
  return /connection terminated|connection refused|timeout exceeded when trying to connect/i.test(errorMessage(error));
}

/**
 * Runs a store operation, turning driver-level connection failures into
 * StorageUnavailableError. Query errors (constraint violations and the like)
 * pass through untouched.
 */
export async function withStorage<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof StorageUnavailableError || !isConnectionError(error)) {
      throw error;
    }
    throw new StorageUnavailableError(`Storage unavailable: ${errorMessage(error)}`, error);
  }
}
