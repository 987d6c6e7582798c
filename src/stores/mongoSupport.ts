import mongoose from 'mongoose';
import { StoreError, type StoreEntity } from '../errors';

export const STORE_TIMEOUT_MS = 30_000;

const DUPLICATE_KEY_CODE = 11000;

const isDuplicateKeyError = (error: unknown): error is { code: number } =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY_CODE;

/** The first field of the unique index a duplicate-key error names in `keyPattern`. */
export function duplicateKeyField(error: unknown): string | undefined {
  if (!isDuplicateKeyError(error) || !('keyPattern' in error)) {
    return undefined;
  }
  const { keyPattern } = error;
  if (typeof keyPattern !== 'object' || keyPattern === null) {
    return undefined;
  }
  return Object.keys(keyPattern)[0];
}

export function toStoreError(error: unknown, entity: StoreEntity): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  if (error instanceof mongoose.Error.CastError) {
    return new StoreError('invalid_id', entity, { cause: error });
  }
  if (isDuplicateKeyError(error)) {
    return new StoreError('duplicate', entity, { cause: error, field: duplicateKeyField(error) });
  }
  return new StoreError('failure', entity, { cause: error });
}

export async function withTimeout<T>(operation: Promise<T>, entity: StoreEntity, timeoutMs = STORE_TIMEOUT_MS): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new StoreError('failure', entity, { cause: new Error(`Operation timed out after ${timeoutMs}ms`) }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Runs one store call under the fixed timeout and normalises whatever it throws. */
export async function runQuery<T>(entity: StoreEntity, query: () => Promise<T>): Promise<T> {
  try {
    return await withTimeout(query(), entity);
  } catch (error) {
    throw toStoreError(error, entity);
  }
}

export const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
