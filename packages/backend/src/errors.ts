import type { ApiErrorCode } from "@supplygraph/shared";

/**
 * Base class for errors the API layer knows how to translate into a
 * structured `{ errorCode, message }` body.
 */
export abstract class AnalyticsError extends Error {
  abstract readonly errorCode: ApiErrorCode;
  abstract readonly statusCode: number;

  /** Whether a transient failure may succeed on a later attempt. */
  readonly retryable: boolean;

  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.retryable = options.retryable ?? false;
  }
}

export class InvalidArgumentError extends AnalyticsError {
  readonly errorCode = "INVALID_REQUEST";
  readonly statusCode = 400;

  constructor(
    message: string,
    readonly details?: Array<{ path: string; message: string }>
  ) {
    super(message);
  }
}

export class NotFoundError extends AnalyticsError {
  readonly errorCode = "NOT_FOUND";
  readonly statusCode = 404;
}

export class ForbiddenOperationError extends AnalyticsError {
  readonly errorCode = "FORBIDDEN";
  readonly statusCode = 403;
}

export class AnalysisTimeoutError extends AnalyticsError {
  readonly errorCode = "TIMEOUT";
  readonly statusCode = 504;

  constructor(
    readonly analysis: string,
    readonly timeoutMs: number
  ) {
    super(`Analysis '${analysis}' timed out after ${timeoutMs}ms`);
  }
}

export class AnalysisCancelledError extends AnalyticsError {
  readonly errorCode = "CANCELLED";
  readonly statusCode = 503;

  constructor(
    readonly analysis: string,
    reason = "cancelled by caller"
  ) {
    super(`Analysis '${analysis}' was cancelled: ${reason}`);
  }
}

export class StoreUnavailableError extends AnalyticsError {
  readonly errorCode = "STORE_UNAVAILABLE";
  readonly statusCode = 503;
}

/**
 * Failure raised by the graph store (connectivity, query execution, GDS).
 * Transient driver failures are marked retryable.
 */
export class GraphStoreError extends AnalyticsError {
  readonly errorCode = "INTERNAL_ERROR";
  readonly statusCode = 500;

  constructor(
    message: string,
    readonly neo4jCode?: string,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options);
  }
}
