import { expect } from "chai";
import { describe, it } from "mocha";
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
} from "openai";

import { RetryExhaustedError } from "../../../services/retryExecutor.js";
import {
  classifyUpstreamError,
  isRetryable,
  parseRetryAfterSeconds,
} from "../../../translation/errors/classify.js";
import {
  createValidationError,
  ERROR_MESSAGES,
  toSimpleError,
  toWireError,
  translateError,
} from "../../../translation/errors/errorTranslator.js";
import { RequestValidationError } from "../../../translation/errors/RequestValidationError.js";

import type { ErrorEnvelope } from "../../../types/index.js";

const CORRELATION_ID = "req_aaaaaaaaaaaa";

function rateLimited(retryAfter?: string): RateLimitError {
  const headers = new Headers(retryAfter === undefined ? {} : { "retry-after": retryAfter });
  return new RateLimitError(429, undefined, "Too Many Requests", headers);
}

function fields(envelope: ErrorEnvelope): Omit<ErrorEnvelope, "correlationId"> {
  const { correlationId, ...rest } = envelope;
  expect(correlationId).to.equal(CORRELATION_ID);
  return rest;
}

describe("translateError", () => {
  it("maps rate limits to 429 and keeps Retry-After", () => {
    expect(fields(translateError(rateLimited("7"), undefined, CORRELATION_ID))).to.deep.equal({
      kind: "rate_limit",
      type: "rate_limit_error",
      httpStatus: 429,
      message: ERROR_MESSAGES.RATE_LIMIT,
      retryAfterSeconds: 7,
    });
  });

  it("omits retryAfterSeconds when the upstream sent none", () => {
    expect(fields(translateError(rateLimited(), undefined, CORRELATION_ID))).to.deep.equal({
      kind: "rate_limit",
      type: "rate_limit_error",
      httpStatus: 429,
      message: ERROR_MESSAGES.RATE_LIMIT,
    });
  });

  it("maps authentication and permission failures", () => {
    const auth = translateError(new AuthenticationError(401, undefined, "no key", new Headers()), undefined, CORRELATION_ID);
    const permission = translateError(
      new PermissionDeniedError(403, undefined, "forbidden", new Headers()),
      undefined,
      CORRELATION_ID,
    );

    expect(fields(auth)).to.deep.equal({
      kind: "auth",
      type: "authentication_error",
      httpStatus: 401,
      message: ERROR_MESSAGES.AUTH,
    });
    expect(fields(permission)).to.deep.equal({
      kind: "auth",
      type: "permission_denied",
      httpStatus: 403,
      message: ERROR_MESSAGES.PERMISSION,
    });
  });

  it("names the requested model when it is not found", () => {
    const envelope = translateError(new NotFoundError(404, undefined, "no such model", new Headers()), "gpt-9", CORRELATION_ID);

    expect(fields(envelope)).to.deep.equal({
      kind: "not_found",
      type: "model_not_found",
      httpStatus: 404,
      message: "The model 'gpt-9' does not exist or you do not have access to it.",
      model: "gpt-9",
    });
  });

  it("words a not-found without a model generically", () => {
    const envelope = translateError(new NotFoundError(404, undefined, "missing", new Headers()), undefined, CORRELATION_ID);
    expect(envelope.message).to.equal("The model 'requested' does not exist or you do not have access to it.");
    expect(envelope).not.to.have.property("model");
  });

  it("maps bad request, conflict and unprocessable entity", () => {
    const badRequest = translateError(new BadRequestError(400, undefined, "bad", new Headers()), undefined, CORRELATION_ID);
    const conflict = translateError(new ConflictError(409, undefined, "conflict", new Headers()), undefined, CORRELATION_ID);
    const validation = translateError(
      new UnprocessableEntityError(422, undefined, "invalid", new Headers()),
      undefined,
      CORRELATION_ID,
    );

    expect(fields(badRequest)).to.deep.equal({
      kind: "bad_request",
      type: "invalid_request_error",
      httpStatus: 400,
      message: ERROR_MESSAGES.BAD_REQUEST,
    });
    expect(fields(conflict)).to.deep.equal({
      kind: "bad_request",
      type: "conflict_error",
      httpStatus: 409,
      message: ERROR_MESSAGES.CONFLICT,
    });
    expect(fields(validation)).to.deep.equal({
      kind: "validation",
      type: "validation_error",
      httpStatus: 422,
      message: ERROR_MESSAGES.VALIDATION,
    });
  });

  it("reports every upstream 5xx as a 500", () => {
    const envelope = translateError(new InternalServerError(503, undefined, "overloaded", new Headers()), undefined, CORRELATION_ID);

    expect(fields(envelope)).to.deep.equal({
      kind: "internal",
      type: "internal_server_error",
      httpStatus: 500,
      message: ERROR_MESSAGES.INTERNAL,
    });
  });

  it("passes an unmapped upstream status through as api_error_<status>", () => {
    const envelope = translateError(new APIError(418, undefined, "teapot", new Headers()), undefined, CORRELATION_ID);

    expect(fields(envelope)).to.deep.equal({
      kind: "internal",
      type: "api_error_418",
      httpStatus: 418,
      message: ERROR_MESSAGES.INTERNAL,
    });
  });

  it("maps connection failures to 503 and timeouts to 504", () => {
    const connection = translateError(new APIConnectionError({ message: "refused" }), undefined, CORRELATION_ID);
    const timeout = translateError(new APIConnectionTimeoutError({ message: "timed out" }), undefined, CORRELATION_ID);

    expect(fields(connection)).to.deep.equal({
      kind: "connection",
      type: "connection_error",
      httpStatus: 503,
      message: ERROR_MESSAGES.CONNECTION,
    });
    expect(fields(timeout)).to.deep.equal({
      kind: "timeout",
      type: "timeout_error",
      httpStatus: 504,
      message: ERROR_MESSAGES.TIMEOUT,
    });
  });

  it("classifies raw transport errors by their code", () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:9"), { code: "ECONNREFUSED" });
    const headersTimeout = new Error("fetch failed", { cause: { code: "UND_ERR_HEADERS_TIMEOUT" } });

    expect(translateError(refused, undefined, CORRELATION_ID).kind).to.equal("connection");
    expect(translateError(headersTimeout, undefined, CORRELATION_ID).kind).to.equal("timeout");
  });

  it("maps a TimeoutError from an abort signal to 504", () => {
    const timedOut = new Error("The operation was aborted due to timeout");
    timedOut.name = "TimeoutError";

    expect(classifyUpstreamError(timedOut)).to.deep.equal({ kind: "timeout" });
    expect(fields(translateError(timedOut, "gpt-4", CORRELATION_ID))).to.deep.equal({
      kind: "timeout",
      type: "timeout_error",
      httpStatus: 504,
      message: ERROR_MESSAGES.TIMEOUT,
      model: "gpt-4",
    });
  });

  it("forwards local validation messages verbatim as 400", () => {
    const envelope = translateError(new RequestValidationError("model is required", "model"), undefined, CORRELATION_ID);

    expect(fields(envelope)).to.deep.equal({
      kind: "bad_request",
      type: "invalid_request_error",
      httpStatus: 400,
      message: "model is required",
    });
  });

  it("reports a missing or mistyped field as a 422 validation error", () => {
    const envelope = translateError(new RequestValidationError("model is required", "model", "schema"), undefined, CORRELATION_ID);

    expect(fields(envelope)).to.deep.equal({
      kind: "validation",
      type: "validation_error",
      httpStatus: 422,
      message: "model is required",
    });
  });

  it("maps cancelled and unrecognised failures to unknown_error", () => {
    const unknownFields = {
      kind: "internal",
      type: "unknown_error",
      httpStatus: 500,
      message: ERROR_MESSAGES.INTERNAL,
    };

    expect(fields(translateError(new APIUserAbortError({ message: "aborted" }), undefined, CORRELATION_ID))).to.deep.equal(
      unknownFields,
    );
    expect(fields(translateError(new Error("something odd"), undefined, CORRELATION_ID))).to.deep.equal(unknownFields);
    expect(fields(translateError("a string", undefined, CORRELATION_ID))).to.deep.equal(unknownFields);
  });

  it("never forwards upstream error text", () => {
    const envelope = translateError(
      new BadRequestError(400, undefined, "sk-test-secret leaked in upstream message", new Headers()),
      undefined,
      CORRELATION_ID,
    );
    expect(envelope.message).to.equal(ERROR_MESSAGES.BAD_REQUEST);
  });

  it("classifies an exhausted retry by its last failure", () => {
    const exhausted = new RetryExhaustedError("chat_completion", 4, rateLimited("3"));

    expect(fields(translateError(exhausted, "gpt-4", CORRELATION_ID))).to.deep.equal({
      kind: "rate_limit",
      type: "rate_limit_error",
      httpStatus: 429,
      message: ERROR_MESSAGES.RATE_LIMIT,
      retryAfterSeconds: 3,
      model: "gpt-4",
    });
  });

  it("generates a correlation id when none is given", () => {
    const envelope = translateError(new Error("boom"));
    expect(envelope.correlationId).to.match(/^req_[0-9a-f]{12}$/);
  });
});

describe("createValidationError", () => {
  it("builds a 400 envelope with the given message", () => {
    expect(createValidationError("prompt is required", CORRELATION_ID, "gpt-4")).to.deep.equal({
      kind: "bad_request",
      type: "invalid_request_error",
      httpStatus: 400,
      message: "prompt is required",
      correlationId: CORRELATION_ID,
      model: "gpt-4",
    });
  });
});

describe("createValidationError for schema failures", () => {
  it("builds a 422 envelope", () => {
    expect(createValidationError("prompt is required", CORRELATION_ID, undefined, "schema")).to.deep.equal({
      kind: "validation",
      type: "validation_error",
      httpStatus: 422,
      message: "prompt is required",
      correlationId: CORRELATION_ID,
    });
  });
});

describe("wire error shapes", () => {
  const envelope: ErrorEnvelope = {
    kind: "not_found",
    type: "model_not_found",
    httpStatus: 404,
    message: "The model 'gpt-9' does not exist or you do not have access to it.",
    correlationId: CORRELATION_ID,
    model: "gpt-9",
  };

  it("toWireError renders the nested error object", () => {
    expect(toWireError(envelope, "2024-01-01T00:00:00.000Z")).to.deep.equal({
      error: {
        message: "The model 'gpt-9' does not exist or you do not have access to it.",
        type: "model_not_found",
        code: 404,
      },
      correlation_id: CORRELATION_ID,
      created_at: "2024-01-01T00:00:00.000Z",
      model: "gpt-9",
    });
  });

  it("toWireError leaves model out when the envelope has none", () => {
    const { model: _model, ...withoutModel } = envelope;
    expect(toWireError(withoutModel, "2024-01-01T00:00:00.000Z")).not.to.have.property("model");
  });

  it("toSimpleError keeps only the message", () => {
    expect(toSimpleError(envelope)).to.deep.equal({
      error: "The model 'gpt-9' does not exist or you do not have access to it.",
    });
  });
});

describe("classifyUpstreamError and isRetryable", () => {
  it("retries transient kinds only", () => {
    expect(isRetryable(classifyUpstreamError(new APIConnectionError({ message: "reset" })))).to.equal(true);
    expect(isRetryable(classifyUpstreamError(new APIConnectionTimeoutError({ message: "slow" })))).to.equal(true);
    expect(isRetryable(classifyUpstreamError(rateLimited()))).to.equal(true);
    expect(isRetryable(classifyUpstreamError(new InternalServerError(502, undefined, "bad gateway", new Headers())))).to.equal(
      true,
    );
    expect(isRetryable(classifyUpstreamError(new AuthenticationError(401, undefined, "no", new Headers())))).to.equal(false);
    expect(isRetryable(classifyUpstreamError(new APIError(418, undefined, "teapot", new Headers())))).to.equal(false);
    expect(isRetryable(classifyUpstreamError(new RequestValidationError("bad")))).to.equal(false);
    expect(isRetryable(classifyUpstreamError(new Error("boom")))).to.equal(false);
  });

  it("keeps the upstream status of a 5xx", () => {
    expect(classifyUpstreamError(new InternalServerError(503, undefined, "busy", new Headers()))).to.deep.equal({
      kind: "internal",
      status: 503,
    });
  });
});

describe("parseRetryAfterSeconds", () => {
  it("reads whole and fractional seconds", () => {
    expect(parseRetryAfterSeconds("7")).to.equal(7);
    expect(parseRetryAfterSeconds("2.5")).to.equal(3);
    expect(parseRetryAfterSeconds("0")).to.equal(0);
  });

  it("ignores missing, negative and HTTP-date values", () => {
    expect(parseRetryAfterSeconds(null)).to.equal(undefined);
    expect(parseRetryAfterSeconds(undefined)).to.equal(undefined);
    expect(parseRetryAfterSeconds("")).to.equal(undefined);
    expect(parseRetryAfterSeconds("-1")).to.equal(undefined);
    expect(parseRetryAfterSeconds("Wed, 21 Oct 2015 07:28:00 GMT")).to.equal(undefined);
  });
});
