import { DomainError, DomainErrorCode } from '@bloxstack/platform-core';

export function upstreamUnavailableError(cause: Error): DomainError {
  return new DomainError('upstream unavailable', 502, cause, DomainErrorCode.UPSTREAM_UNAVAILABLE);
}

export function routeNotFoundError(method: string, path: string): DomainError {
  return new DomainError(`no route for ${method} ${path}`, 404, undefined, DomainErrorCode.ROUTE_NOT_FOUND);
}
