import { HttpRequestError } from './errors';
import { createLogger } from './logger';

const log = createLogger('RETRY');

export interface RetryOptions {
  maxAttempts: number;
  backoffMs: number;
  isRetryable: (error: unknown) => boolean;
  label?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Rate limits, server errors and timeouts are worth another attempt. */
export function isTransientHttpError(error: unknown): boolean {
  if (!(error instanceof HttpRequestError)) return false;
  if (error.kind === 'timeout' || error.kind === 'network') return true;
  if (error.kind === 'http_status' && error.status !== undefined) {
    return error.status === 429 || error.status >= 500;
  }
  return false;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === attempts || !options.isRetryable(error)) {
        throw error;
      }
      const delay = options.backoffMs * Math.pow(2, attempt - 1);
      log.warn(`${options.label || 'operation'} failed, retrying`, {
        attempt,
        maxAttempts: attempts,
        delayMs: delay,
        error: error instanceof Error ? error.message : String(error),
      });
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
