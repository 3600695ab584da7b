export {
  ERROR_MESSAGES,
  createValidationError,
  modelNotFoundMessage,
  toSimpleError,
  toWireError,
  translateError,
} from './errorTranslator.js';
export { classifyUpstreamError, isRetryable, parseRetryAfterSeconds } from './classify.js';
export type { UpstreamErrorKind } from './classify.js';
export { RequestValidationError } from './RequestValidationError.js';
export type { ValidationFailure } from './RequestValidationError.js';
