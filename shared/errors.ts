/**
 * Error hierarchy for the analysis pipeline. `statusCode` is what the HTTP
 * layer answers with when one of these escapes a handler.
 */
export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode = 500, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }
}

/** Provider disabled or missing credentials; callers move to their fallback. */
export class ProviderUnconfiguredError extends AppError {
  constructor(provider: string, reason: string) {
    super(`${provider} is not configured: ${reason}`, 'PROVIDER_UNCONFIGURED', 500, { provider });
  }
}

export class ProviderRequestError extends AppError {
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(`${provider} request failed: ${message}`, 'PROVIDER_REQUEST_FAILED', 502, { provider, status });
    this.status = status;
  }
}

export class FeedParseError extends AppError {
  constructor(message: string) {
    super(message, 'FEED_PARSE_FAILED', 502);
  }
}

export class AcquisitionError extends AppError {
  readonly url: string;
  readonly httpStatus?: number;

  constructor(url: string, message: string, httpStatus?: number) {
    super(`Failed to acquire ${url}: ${message}`, 'ACQUISITION_FAILED', 502, { url, httpStatus });
    this.url = url;
    this.httpStatus = httpStatus;
  }
}

/** Model output that cannot be turned into the expected JSON. */
export class GenerationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'GENERATION_FAILED', 502, context);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Invalid stage transition ${from} -> ${to}`, 'INVALID_TRANSITION', 409, { from, to });
  }
}

export class JobNotFoundError extends AppError {
  constructor(id: string) {
    super(`Analysis ${id} not found`, 'NOT_FOUND', 404, { id });
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'BAD_REQUEST', 400);
  }
}
