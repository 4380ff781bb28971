/**
 * Raised when a single attempt exceeds its time budget
 */
export class OperationTimeoutError extends Error {
  constructor(operationName: string, timeoutMs: number) {
    super(`${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Raised when every attempt failed with a retryable error
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
    operationName: string,
  ) {
    super(
      `${operationName} failed after ${attempts} attempts: ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
    );
    this.name = 'RetryExhaustedError';
  }
}

export class OperationAbortedError extends Error {
  constructor(operationName: string) {
    super(`${operationName} was aborted`);
    this.name = 'OperationAbortedError';
  }
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  /** Budget of one attempt; the attempt's signal aborts when it runs out */
  timeoutMs: number;
  operationName: string;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an operation with a hard timeout. The operation receives a signal
 * that aborts when the budget is exhausted.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operationName: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new OperationTimeoutError(operationName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Execute with bounded retries and exponential backoff with jitter.
 * Non-retryable errors are rethrown as-is on the first occurrence.
 */
export async function executeWithRetry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, timeoutMs, operationName } = options;
  const attempts = Math.max(1, maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await withTimeout(operation, timeoutMs, operationName);
    } catch (error) {
      lastError = error;

      if (!options.isRetryable(error)) {
        throw error;
      }
      if (attempt === attempts) {
        break;
      }

      const delayMs =
        baseDelayMs * Math.pow(2, attempt - 1) +
        Math.random() * (baseDelayMs / 2);
      options.onRetry?.(attempt, delayMs, error);
      await delay(delayMs);
    }
  }

  throw new RetryExhaustedError(attempts, lastError, operationName);
}

/**
 * Settle with the promise, or reject as soon as the signal aborts.
 * The underlying promise keeps running for anyone else awaiting it.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  operationName: string,
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new OperationAbortedError(operationName));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new OperationAbortedError(operationName));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
