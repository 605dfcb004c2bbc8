import { DomainError, DomainErrorCode } from '@bloxstack/platform-core';

export const ApiErrorCode = {
  ...DomainErrorCode,
  BLOB_NOT_FOUND: 'BLOB_NOT_FOUND',
  BLOB_STORE_ERROR: 'BLOB_STORE_ERROR',
} as const;

export type ApiErrorCodeType = (typeof ApiErrorCode)[keyof typeof ApiErrorCode];

export class BlobNotFoundError extends DomainError {
  constructor(public readonly fileName: string) {
    super(`blob ${fileName} not found`, 400, undefined, ApiErrorCode.BLOB_NOT_FOUND, { fileName });
    this.name = 'BlobNotFoundError';
  }
}

export class BlobStoreError extends DomainError {
  constructor(operation: string, cause: Error) {
    super(`blob store ${operation} failed: ${cause.message}`, 400, cause, ApiErrorCode.BLOB_STORE_ERROR, { operation });
    this.name = 'BlobStoreError';
  }
}

export function noResponseError(): DomainError {
  return new DomainError('no response', 500, undefined, ApiErrorCode.NO_RESPONSE);
}

export function routeNotFoundError(method: string, path: string): DomainError {
  return new DomainError(`no route for ${method} ${path}`, 404, undefined, ApiErrorCode.ROUTE_NOT_FOUND);
}

export function unauthorizedError(): DomainError {
  return new DomainError('authentication required', 401, undefined, ApiErrorCode.UNAUTHORIZED);
}

export function internalError(cause: Error): DomainError {
  return new DomainError('internal server error', 500, cause, ApiErrorCode.INTERNAL_ERROR);
}
