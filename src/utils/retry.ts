import { getLogger } from '../core/logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffFactor: number;
  /** Decides whether a failure is worth another attempt; all are by default */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 250,
  maxDelay: 5000,
  backoffFactor: 2,
};

/**
 * Retry a function with exponential backoff and jitter
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = getLogger();
  let lastError: Error = new Error('retry: no attempt made');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      lastError = error;

      if (attempt === opts.maxRetries) {
        break;
      }
      if (opts.shouldRetry && !opts.shouldRetry(error)) {
        break;
      }

      const delay = Math.min(
        opts.baseDelay * Math.pow(opts.backoffFactor, attempt) + Math.random() * opts.baseDelay,
        opts.maxDelay,
      );

      logger.debug({ attempt: attempt + 1, delay, error: error.message }, 'Retrying after error');

      if (opts.onRetry) {
        opts.onRetry(attempt + 1, error);
      }

      await sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
