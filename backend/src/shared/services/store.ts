import type { DataSource } from 'typeorm';
import { QueryFailedError } from 'typeorm';
import { getDataSource } from '@shared/db/data-source.js';
import { toStorageError } from '@shared/middleware/errorHandler.js';

/**
 * Run work against the shared store. Store failures surface as
 * StorageUnavailable and are not retried; other errors propagate as thrown.
 */
export async function withStore<T>(work: (dataSource: DataSource) => Promise<T>): Promise<T> {
  try {
    const dataSource = await getDataSource();
    return await work(dataSource);
  } catch (error) {
    throw toStorageError(error);
  }
}

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // PostgreSQL unique_violation
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

/**
 * True when a write failed on a unique index or primary key
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) {
    return false;
  }
  const { code } = driverError;
  return typeof code === 'string' && UNIQUE_VIOLATION_CODES.has(code);
}

/**
 * Drain an async sequence into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
