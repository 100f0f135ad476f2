import { logger } from './logger';

export const BASE_RETRY_DELAY_MS = 500;

export interface RetryOptions {
  label: string;
  retries: number;
  baseDelayMs?: number;
  /** Return false to give up immediately on this error */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Call fn until it resolves, at most retries + 1 times, with exponential backoff
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const baseDelay = options.baseDelayMs ?? BASE_RETRY_DELAY_MS;
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error;
      if (attempt >= options.retries || (options.shouldRetry && !options.shouldRetry(error))) {
        break;
      }
      const delay = baseDelay * Math.pow(2, attempt);
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`${options.label} failed (attempt ${attempt + 1}/${options.retries + 1}): ${message}; retrying in ${delay}ms`);
      await wait(delay);
    }
  }

  throw lastError;
}
