import { EmbeddingServiceError } from '../common/errors/pipeline.errors';
import { errorMessage, errorStatus } from '../common/utils/errors';

// Network-level errors that are typically transient
const RETRYABLE_PATTERNS = [
  'fetch failed',
  'network error',
  'econnreset',
  'econnrefused',
  'etimedout',
  'socket hang up',
  'dns lookup failed',
  'getaddrinfo',
  'rate limit',
  'resource_exhausted',
  'overloaded',
];

const RETRYABLE_STATUSES = new Set([408, 409, 425, 429]);

/**
 * Map an SDK error onto the transient/permanent split. Rate limits,
 * timeouts, 5xx and network failures are transient; any other client
 * error is permanent.
 */
export function toEmbeddingServiceError(
  error: unknown,
  providerName: string,
): EmbeddingServiceError {
  if (error instanceof EmbeddingServiceError) {
    return error;
  }

  const message = `${providerName} embedding failed: ${errorMessage(error)}`;
  const status = errorStatus(error);

  if (status !== undefined) {
    const transient =
      RETRYABLE_STATUSES.has(status) || (status >= 500 && status < 600);
    return new EmbeddingServiceError(
      transient ? 'transient' : 'permanent',
      message,
      status,
    );
  }

  const lower = errorMessage(error).toLowerCase();
  if (RETRYABLE_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new EmbeddingServiceError('transient', message);
  }

  return new EmbeddingServiceError('permanent', message);
}
