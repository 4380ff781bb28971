import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Identifies the unit of work a failure belongs to, so an operator can
 * re-attempt it manually.
 */
export interface FailureContext {
  segmentId?: string;
  queryId?: string;
  fingerprint?: string;
}

export type EmbeddingFailureKind = 'transient' | 'permanent';

/**
 * Raised by embedding providers. The pipeline maps it onto the
 * transient/permanent taxonomy below.
 */
export class EmbeddingServiceError extends Error {
  constructor(
    public readonly kind: EmbeddingFailureKind,
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'EmbeddingServiceError';
  }
}

/**
 * Embedding service timeout or rate limit that survived every retry attempt
 */
export class TransientExternalError extends HttpException {
  constructor(
    message: string,
    public readonly context: FailureContext,
    public readonly attempts: number,
  ) {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message,
        error: 'TransientExternalError',
        details: { ...context, kind: 'transient', attempts },
        retryAfter: 30,
      },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}

/**
 * Malformed input or unsupported content; never retried
 */
export class PermanentExternalError extends HttpException {
  constructor(
    message: string,
    public readonly context: FailureContext,
  ) {
    super(
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        message,
        error: 'PermanentExternalError',
        details: { ...context, kind: 'permanent' },
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

/**
 * Two different contents produced the same fingerprint
 */
export class CacheInconsistencyError extends HttpException {
  constructor(
    public readonly fingerprint: string,
    public readonly context: FailureContext,
  ) {
    super(
      {
        statusCode: HttpStatus.CONFLICT,
        message: `Fingerprint ${fingerprint} is already bound to different content`,
        error: 'CacheInconsistencyError',
        details: { ...context, fingerprint, kind: 'permanent' },
      },
      HttpStatus.CONFLICT,
    );
  }
}

export class IndexCapacityError extends HttpException {
  constructor(
    public readonly capacity: number,
    public readonly context: FailureContext,
    public readonly queuedForRetry = false,
  ) {
    super(
      {
        statusCode: HttpStatus.INSUFFICIENT_STORAGE,
        message: `Vector index is at capacity (${capacity} points)`,
        error: 'IndexCapacityError',
        details: { ...context, capacity, queuedForRetry },
      },
      HttpStatus.INSUFFICIENT_STORAGE,
    );
  }

  /**
   * Same failure, marked as queued for a later retry
   */
  queued(): IndexCapacityError {
    return new IndexCapacityError(this.capacity, this.context, true);
  }
}

export class FilterValidationError extends HttpException {
  constructor(public readonly problems: string[]) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        message: problems,
        error: 'FilterValidationError',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * The caller went away before the search finished
 */
export class SearchAbortedError extends HttpException {
  constructor(public readonly queryId: string) {
    super(
      {
        statusCode: HttpStatus.REQUEST_TIMEOUT,
        message: 'Search request was cancelled by the caller',
        error: 'SearchAbortedError',
        details: { queryId },
      },
      HttpStatus.REQUEST_TIMEOUT,
    );
  }
}
