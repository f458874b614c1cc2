import { logger } from './logger';

export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Spreads retries so several units are not re-sent to in lockstep. */
  jitter?: boolean;
  /** Names the send or bind in log lines. */
  operationName?: string;
}

export interface RetryableError extends Error {
  code?: string;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
  jitter: true,
  operationName: 'operation',
};

const RETRYABLE_CODES = new Set([
  'EADDRINUSE',
  'EAGAIN',
  'ENOBUFS',
  'ENETDOWN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EHOSTDOWN',
]);

/**
 * Determines if a socket error is transient and should be retried:
 * interface or route flapping, full send buffers, and a listening port still
 * held by a previous process.
 */
export function isRetryableError(error: RetryableError): boolean {
  return error.code !== undefined && RETRYABLE_CODES.has(error.code);
}

function toRetryableError(error: unknown): RetryableError {
  return error instanceof Error ? error : new Error(String(error));
}

function backoffDelay(attempt: number, options: Required<RetryOptions>): number {
  const capped = Math.min(options.initialDelayMs * options.backoffMultiplier ** attempt, options.maxDelayMs);
  return Math.floor(options.jitter ? Math.random() * capped : capped);
}

/**
 * Runs a datagram send or a listener bind, trying again with backoff while the
 * socket reports a transient code. Any other error is thrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toRetryableError(error);

      if (attempt >= opts.maxRetries) {
        logger.error({
          operation: opts.operationName,
          attempt: attempt + 1,
          maxRetries: opts.maxRetries,
          err: lastError
        }, `${opts.operationName} gave up`);
        throw lastError;
      }

      if (!isRetryableError(lastError)) {
        logger.debug({
          operation: opts.operationName,
          err: lastError,
          code: lastError.code
        }, `${opts.operationName} failed with a permanent socket error`);
        throw lastError;
      }

      const delay = backoffDelay(attempt, opts);
      logger.warn({
        operation: opts.operationName,
        attempt: attempt + 1,
        maxRetries: opts.maxRetries,
        delayMs: delay,
        err: lastError.message,
        code: lastError.code
      }, `${opts.operationName} hit a transient socket error`);

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}
