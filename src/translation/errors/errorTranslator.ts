/**
 * Error Translator - SSOT for client-facing errors
 *
 * Every failure, from the upstream or from local validation, leaves the
 * shim through translateError(). Messages are fixed strings chosen here;
 * upstream error text is logged but never forwarded.
 */

import { logger } from '../../logging/index.js';
import { RetryExhaustedError } from '../../services/retryExecutor.js';
import { generateCorrelationId } from '../../utils/correlation.js';

import { classifyUpstreamError, type UpstreamErrorKind } from './classify.js';
import { RequestValidationError, type ValidationFailure } from './RequestValidationError.js';

import type { ErrorEnvelope, OllamaErrorResponse, OllamaSimpleError } from '../../types/index.js';

type EnvelopeFields = Omit<ErrorEnvelope, 'correlationId' | 'model'>;

export const ERROR_MESSAGES = {
  RATE_LIMIT: 'Rate limit exceeded. Please try again later.',
  AUTH: 'Authentication failed. Please check your API key.',
  PERMISSION: 'Permission denied. You do not have access to this resource.',
  BAD_REQUEST: 'Invalid request parameters.',
  CONFLICT: 'Request conflicts with current state.',
  VALIDATION: 'Request validation failed.',
  INTERNAL: 'An internal server error occurred.',
  CONNECTION: 'Failed to connect to the API service.',
  TIMEOUT: 'Request timed out.',
} as const;

export function modelNotFoundMessage(model: string | undefined): string {
  return `The model '${model ?? 'requested'}' does not exist or you do not have access to it.`;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled error classification: ${JSON.stringify(value)}`);
}

function toEnvelopeFields(classification: UpstreamErrorKind, model: string | undefined): EnvelopeFields {
  switch (classification.kind) {
    case 'rate_limit': {
      const fields: EnvelopeFields = {
        kind: 'rate_limit',
        type: 'rate_limit_error',
        httpStatus: 429,
        message: ERROR_MESSAGES.RATE_LIMIT,
      };
      if (classification.retryAfterSeconds !== undefined) {
        fields.retryAfterSeconds = classification.retryAfterSeconds;
      }
      return fields;
    }
    case 'auth':
      return { kind: 'auth', type: 'authentication_error', httpStatus: 401, message: ERROR_MESSAGES.AUTH };
    case 'permission':
      return { kind: 'auth', type: 'permission_denied', httpStatus: 403, message: ERROR_MESSAGES.PERMISSION };
    case 'not_found':
      return { kind: 'not_found', type: 'model_not_found', httpStatus: 404, message: modelNotFoundMessage(model) };
    case 'bad_request':
      return { kind: 'bad_request', type: 'invalid_request_error', httpStatus: 400, message: ERROR_MESSAGES.BAD_REQUEST };
    case 'conflict':
      return { kind: 'bad_request', type: 'conflict_error', httpStatus: 409, message: ERROR_MESSAGES.CONFLICT };
    case 'validation':
      return { kind: 'validation', type: 'validation_error', httpStatus: 422, message: ERROR_MESSAGES.VALIDATION };
    case 'internal':
      return { kind: 'internal', type: 'internal_server_error', httpStatus: 500, message: ERROR_MESSAGES.INTERNAL };
    case 'connection':
      return { kind: 'connection', type: 'connection_error', httpStatus: 503, message: ERROR_MESSAGES.CONNECTION };
    case 'timeout':
      return { kind: 'timeout', type: 'timeout_error', httpStatus: 504, message: ERROR_MESSAGES.TIMEOUT };
    case 'api_status':
      return {
        kind: 'internal',
        type: `api_error_${classification.status}`,
        httpStatus: classification.status,
        message: ERROR_MESSAGES.INTERNAL,
      };
    case 'request_validation':
      return classification.failure === 'schema'
        ? { kind: 'validation', type: 'validation_error', httpStatus: 422, message: classification.message }
        : { kind: 'bad_request', type: 'invalid_request_error', httpStatus: 400, message: classification.message };
    case 'cancelled':
    case 'unknown':
      return { kind: 'internal', type: 'unknown_error', httpStatus: 500, message: ERROR_MESSAGES.INTERNAL };
    default:
      return assertNever(classification);
  }
}

/**
 * Classify any thrown value into an ErrorEnvelope.
 * A RetryExhaustedError is classified by the failure that exhausted it.
 */
export function translateError(error: unknown, model?: string, correlationId?: string): ErrorEnvelope {
  const cause = error instanceof RetryExhaustedError ? error.lastError : error;
  const classification = classifyUpstreamError(cause);
  const fields = toEnvelopeFields(classification, model);

  const envelope: ErrorEnvelope = {
    ...fields,
    correlationId: correlationId ?? generateCorrelationId(),
  };
  if (model !== undefined) {
    envelope.model = model;
  }

  const detail = cause instanceof Error ? cause.message : String(cause);
  logger.error(
    `[ERROR] ${envelope.type} (${envelope.kind}, ${envelope.httpStatus}) model=${model ?? '-'} correlation=${envelope.correlationId}: ${detail}`,
  );

  return envelope;
}

/**
 * Local validation failure with our own message: 422 for a schema failure,
 * 400 otherwise
 */
export function createValidationError(
  message: string,
  correlationId?: string,
  model?: string,
  failure: ValidationFailure = 'semantic',
): ErrorEnvelope {
  return translateError(new RequestValidationError(message, undefined, failure), model, correlationId);
}

export function toWireError(envelope: ErrorEnvelope, createdAt: string = new Date().toISOString()): OllamaErrorResponse {
  const wire: OllamaErrorResponse = {
    error: { message: envelope.message, type: envelope.type, code: envelope.httpStatus },
    correlation_id: envelope.correlationId,
    created_at: createdAt,
  };
  if (envelope.model !== undefined) {
    wire.model = envelope.model;
  }
  return wire;
}

export function toSimpleError(envelope: ErrorEnvelope): OllamaSimpleError {
  return { error: envelope.message };
}
