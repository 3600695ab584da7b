/**
 * HTTP Module
 *
 * HTTP-related utilities for error responses, NDJSON streaming and
 * per-request context.
 */

export { sendErrorEnvelope, sendHTTPError } from './errorResponseHandler.js';
export {
  getCorrelationId,
  requestedModel,
  sendSuccessJSON,
  setCorrelationId,
  wantsStream,
} from './handlerUtils.js';
export { createRequestContextMiddleware } from './requestContext.js';
export { formatNdjsonLine, pipeRelayToResponse, setNdjsonHeaders } from './streamUtils.js';
