export type StoreEntity = 'User' | 'Team registration';

export type StoreErrorKind = 'invalid_id' | 'not_found' | 'duplicate' | 'failure';

const STORE_MESSAGES: Record<StoreErrorKind, (entity: StoreEntity) => string> = {
  invalid_id: (entity) => `Invalid ${entity.toLowerCase()} ID`,
  not_found: (entity) => `${entity} not found`,
  duplicate: (entity) => `${entity} already exists`,
  failure: (entity) => `${entity} store operation failed`
};

/** Raised by the persistence layer; callers switch on `kind`. */
export class StoreError extends Error {
  readonly kind: StoreErrorKind;
  readonly entity: StoreEntity;
  /** For `duplicate`, the unique field that collided when the store can tell. */
  readonly field?: string;

  constructor(kind: StoreErrorKind, entity: StoreEntity, options?: { cause?: unknown; field?: string }) {
    super(STORE_MESSAGES[kind](entity), { cause: options?.cause });
    this.name = 'StoreError';
    this.kind = kind;
    this.entity = entity;
    this.field = options?.field;
  }
}

export type ApiErrorKind =
  | 'validation'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'conflict'
  | 'internal';

const STATUS_BY_KIND: Record<ApiErrorKind, number> = {
  validation: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  internal: 500
};

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(kind: ApiErrorKind, message: string, options?: { details?: unknown; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ApiError';
    this.kind = kind;
    this.statusCode = STATUS_BY_KIND[kind];
    this.details = options?.details;
  }
}

export function fromStoreError(error: StoreError): ApiError {
  switch (error.kind) {
    case 'invalid_id':
      return new ApiError('validation', error.message, { cause: error });
    case 'not_found':
      return new ApiError('not_found', error.message, { cause: error });
    case 'duplicate':
      return new ApiError('conflict', error.message, { cause: error });
    case 'failure':
      return new ApiError('internal', 'Internal server error', { cause: error });
    default: {
      const unreachable: never = error.kind;
      throw new Error(`Unhandled store error kind: ${String(unreachable)}`);
    }
  }
}

/** Resolves a unique-field lookup to `null` instead of throwing on a miss. */
export async function notFoundAsNull<T>(lookup: Promise<T>): Promise<T | null> {
  try {
    return await lookup;
  } catch (error) {
    if (error instanceof StoreError && error.kind === 'not_found') {
      return null;
    }
    throw error;
  }
}
