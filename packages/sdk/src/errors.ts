/**
 * Error types for cloud API operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - API errors carry the HTTP status and the API's own error code and response ID
 */

/**
 * Base class for all SDK errors
 */
export abstract class CloudError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when SDK input fails client-side validation
 */
export class ValidationError extends CloudError {
  readonly code = "E_VALIDATION";
}

/**
 * Thrown when the API cannot be reached or the request times out
 */
export class NetworkError extends CloudError {
  readonly code = "E_NETWORK";

  constructor(
    public readonly method: string,
    public readonly url: string,
    options?: ErrorOptions
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : "request failed";
    super(`${method} ${url}: ${reason}`, options);
  }
}

/**
 * Details reported by the API in an error response body
 */
export interface ApiErrorDetails {
  status: number;
  statusText?: string;
  errorCode?: string;
  responseId?: string;
  message?: string | string[];
  method?: string;
  url?: string;
}

/**
 * Base class for non-2xx API responses
 */
export class ApiError extends CloudError {
  readonly code: string = "E_API";
  readonly status: number;
  readonly errorCode: string | undefined;
  readonly responseId: string | undefined;
  readonly method: string | undefined;
  readonly url: string | undefined;

  constructor(details: ApiErrorDetails, options?: ErrorOptions) {
    super(describeApiMessage(details), options);
    this.status = details.status;
    this.errorCode = details.errorCode;
    this.responseId = details.responseId;
    this.method = details.method;
    this.url = details.url;
  }
}

function describeApiMessage(details: ApiErrorDetails): string {
  if (Array.isArray(details.message)) {
    return details.message.join("; ");
  }
  if (details.message) {
    return details.message;
  }
  return details.statusText || `HTTP ${details.status}`;
}

/** 400 Bad Request */
export class BadRequestError extends ApiError {
  override readonly code = "E_BAD_REQUEST";
}

/** 401 Unauthorized: missing or rejected API token */
export class UnauthorizedError extends ApiError {
  override readonly code = "E_UNAUTHORIZED";
}

/** 403 Forbidden */
export class ForbiddenError extends ApiError {
  override readonly code = "E_FORBIDDEN";
}

/** 404 Not Found */
export class NotFoundError extends ApiError {
  override readonly code = "E_NOT_FOUND";
}

/** 409 Conflict */
export class ConflictError extends ApiError {
  override readonly code = "E_CONFLICT";
}

/** 423 Locked */
export class LockedError extends ApiError {
  override readonly code = "E_LOCKED";
}

/** 429 Too Many Requests */
export class TooManyRequestsError extends ApiError {
  override readonly code = "E_TOO_MANY_REQUESTS";
}

/** 500 Internal Server Error */
export class InternalServerError extends ApiError {
  override readonly code = "E_INTERNAL";
}

/**
 * Any other non-2xx status, e.g. 502 from a proxy in front of the API
 */
export class UnexpectedResponseError extends ApiError {
  override readonly code = "E_UNEXPECTED_RESPONSE";
}

/**
 * The API answered with a body that is not its JSON error document
 */
export class MalformedResponseError extends ApiError {
  override readonly code = "E_MALFORMED_RESPONSE";
}

/**
 * True for 401 and 403 responses
 */
export function isAuthError(error: unknown): error is UnauthorizedError | ForbiddenError {
  return error instanceof UnauthorizedError || error instanceof ForbiddenError;
}

/**
 * True for failures worth repeating with the same request: transport
 * errors, 429 and 5xx responses
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof ApiError) {
    return error.status === 429 || error.status >= 500;
  }
  return false;
}

/**
 * Thrown when a poll exhausts its attempt or time budget
 */
export class PollTimeoutError extends CloudError {
  readonly code = "E_POLL_TIMEOUT";

  constructor(
    public readonly lastStatus: string | undefined,
    public readonly attempts: number,
    public readonly target: readonly string[],
    options?: ErrorOptions
  ) {
    super(
      `Timed out waiting for status ${target.map((t) => `'${t}'`).join(" or ")} ` +
        `after ${attempts} attempt(s); last status: ${lastStatus ?? "unknown"}`,
      options
    );
  }
}

/**
 * Thrown when a poll attempt fails
 */
export class PollError extends CloudError {
  readonly code: string = "E_POLL";

  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastStatus: string | undefined,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a poll is aborted through its AbortSignal
 */
export class PollInterruptedError extends PollError {
  override readonly code = "E_POLL_INTERRUPTED";

  constructor(attempts: number, lastStatus: string | undefined, options?: ErrorOptions) {
    super(`Interrupted after ${attempts} attempt(s)`, attempts, lastStatus, options);
  }
}
