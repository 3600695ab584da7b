/**
 * `schema`: a required field is absent or has the wrong JSON type (422).
 * `semantic`: the field is present but its value is unusable (400).
 */
export type ValidationFailure = 'schema' | 'semantic';

/**
 * Raised when a client request fails local validation, before anything is
 * sent upstream. The message is ours, so it reaches the client verbatim.
 */
export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly failure: ValidationFailure = 'semantic',
  ) {
    super(message);
    this.name = 'RequestValidationError';
  }
}
