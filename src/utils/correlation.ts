import { randomBytes } from 'crypto';

import { SHIM_HEADERS } from '../constants/endpoints.js';

import type { IncomingHttpHeaders } from 'http';

export const CORRELATION_ID_PREFIX = 'req_';

/**
 * `req_` followed by 12 hex characters
 */
export function generateCorrelationId(): string {
  return `${CORRELATION_ID_PREFIX}${randomBytes(6).toString('hex')}`;
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  const trimmed = candidate?.trim();
  return trimmed === undefined || trimmed === '' ? undefined : trimmed;
}

/**
 * Reuse the caller's correlation or request id when one is sent, else mint one
 */
export function resolveCorrelationId(headers: IncomingHttpHeaders): string {
  return (
    firstHeaderValue(headers[SHIM_HEADERS.CORRELATION_ID.toLowerCase()]) ??
    firstHeaderValue(headers[SHIM_HEADERS.REQUEST_ID.toLowerCase()]) ??
    generateCorrelationId()
  );
}
