/**
 * Upstream Error Classification
 *
 * Maps whatever the upstream SDK (or the HTTP stack under it) throws onto a
 * closed set of kinds. The retry executor and the error translator both
 * decide from this result, never from the raw error.
 */

import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  AuthenticationError,
  BadRequestError,
  ConflictError,
  InternalServerError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitError,
  UnprocessableEntityError,
} from 'openai';

import { readErrorCode } from '../utils/typeGuards.js';

import { RequestValidationError, type ValidationFailure } from './RequestValidationError.js';

export type UpstreamErrorKind =
  | { kind: 'rate_limit'; retryAfterSeconds?: number }
  | { kind: 'auth' }
  | { kind: 'permission' }
  | { kind: 'not_found' }
  | { kind: 'bad_request' }
  | { kind: 'conflict' }
  | { kind: 'validation' }
  | { kind: 'internal'; status: number }
  | { kind: 'connection' }
  | { kind: 'timeout' }
  | { kind: 'api_status'; status: number }
  | { kind: 'request_validation'; message: string; failure: ValidationFailure }
  | { kind: 'cancelled' }
  | { kind: 'unknown' };

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const CONNECTION_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

/**
 * Parse a `retry-after` header given in seconds. HTTP-date values are ignored.
 */
export function parseRetryAfterSeconds(headerValue: string | null | undefined): number | undefined {
  if (headerValue === null || headerValue === undefined || headerValue.trim() === '') {
    return undefined;
  }
  const seconds = Number(headerValue);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return Math.ceil(seconds);
}

function classifyByCode(error: unknown): UpstreamErrorKind | undefined {
  // Transport errors surface either directly or as the `cause` of a wrapper
  const candidates: unknown[] = [error];
  if (error instanceof Error && error.cause !== undefined) {
    candidates.push(error.cause);
  }

  for (const candidate of candidates) {
    const code = readErrorCode(candidate);
    if (code === undefined) {
      continue;
    }
    if (TIMEOUT_CODES.has(code)) {
      return { kind: 'timeout' };
    }
    if (CONNECTION_CODES.has(code)) {
      return { kind: 'connection' };
    }
  }
  return undefined;
}

export function classifyUpstreamError(error: unknown): UpstreamErrorKind {
  if (error instanceof RequestValidationError) {
    return { kind: 'request_validation', message: error.message, failure: error.failure };
  }

  // Subclasses before their parents: timeout extends connection, both extend APIError
  if (error instanceof APIUserAbortError) {
    return { kind: 'cancelled' };
  }
  if (error instanceof APIConnectionTimeoutError) {
    return { kind: 'timeout' };
  }
  if (error instanceof APIConnectionError) {
    return classifyByCode(error) ?? { kind: 'connection' };
  }
  if (error instanceof RateLimitError) {
    const retryAfterSeconds = parseRetryAfterSeconds(error.headers?.get('retry-after'));
    return retryAfterSeconds === undefined ? { kind: 'rate_limit' } : { kind: 'rate_limit', retryAfterSeconds };
  }
  if (error instanceof AuthenticationError) {
    return { kind: 'auth' };
  }
  if (error instanceof PermissionDeniedError) {
    return { kind: 'permission' };
  }
  if (error instanceof NotFoundError) {
    return { kind: 'not_found' };
  }
  if (error instanceof BadRequestError) {
    return { kind: 'bad_request' };
  }
  if (error instanceof ConflictError) {
    return { kind: 'conflict' };
  }
  if (error instanceof UnprocessableEntityError) {
    return { kind: 'validation' };
  }
  if (error instanceof InternalServerError) {
    return { kind: 'internal', status: error.status };
  }
  if (error instanceof APIError) {
    const status = error.status;
    if (status === undefined) {
      return classifyByCode(error) ?? { kind: 'unknown' };
    }
    return status >= 500 ? { kind: 'internal', status } : { kind: 'api_status', status };
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return { kind: 'cancelled' };
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { kind: 'timeout' };
  }

  return classifyByCode(error) ?? { kind: 'unknown' };
}

/**
 * Connection failures, timeouts, rate limits and upstream 5xx are worth another attempt
 */
export function isRetryable(classification: UpstreamErrorKind): boolean {
  switch (classification.kind) {
    case 'connection':
    case 'timeout':
    case 'rate_limit':
    case 'internal':
      return true;
    case 'api_status':
      return classification.status >= 500 && classification.status < 600;
    default:
      return false;
  }
}
