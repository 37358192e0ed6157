/**
 * Error model for a translation run.
 *
 * ConfigurationError is fatal and raised before any request is dispatched.
 * Request errors never leave the API client: they are converted to
 * CompletionResult values there.
 */

export type RequestErrorType =
  | "timeout"
  | "rate_limited"
  | "server_error"
  | "network"
  | "client_error"
  | "invalid_response";

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class TransientRequestError extends Error {
  constructor(
    public error_type: RequestErrorType,
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = "TransientRequestError";
  }
}

export class PermanentRequestError extends Error {
  constructor(
    public error_type: RequestErrorType,
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = "PermanentRequestError";
  }
}
