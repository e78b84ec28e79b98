/**
 * Error taxonomy for the classification pipeline. Nothing is recovered locally:
 * every error bubbles to the route, which answers with `statusCode`.
 */

export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Missing or invalid settings, raised at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

/**
 * Network failure or non-2xx answer from the completion provider. The message
 * is fixed; the provider's own text stays in `detail` for the logs.
 */
export class UpstreamTransportError extends AppError {
  /** HTTP status returned by the provider, when one was received. */
  readonly upstreamStatus?: number;
  readonly detail: string;

  constructor(detail: string, upstreamStatus?: number, options?: { cause?: unknown }) {
    super('Completion provider request failed', 502, options);
    this.detail = detail;
    this.upstreamStatus = upstreamStatus;
  }
}

/** The provider did not answer within the configured timeout. Safe for the caller to retry. */
export class UpstreamTimeoutError extends AppError {
  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`Completion provider timed out after ${timeoutMs}ms`, 504, options);
  }
}

/** Provider body could not be decoded or does not carry a usable choice. */
export class UpstreamParseError extends AppError {
  readonly rawBody: string;

  constructor(message: string, rawBody: string, options?: { cause?: unknown }) {
    super(message, 502, options);
    this.rawBody = rawBody;
  }
}

/** Completion content is not a JSON object with a string `classification`. */
export class ClassificationParseError extends AppError {
  readonly content: string;

  constructor(message: string, content: string, options?: { cause?: unknown }) {
    super(message, 500, options);
    this.content = content;
  }
}

export function statusForError(error: unknown): number {
  return error instanceof AppError ? error.statusCode : 500;
}
