import { setTimeout as sleep } from 'timers/promises';
import type winston from 'winston';
import { RateLimitError, toBackendError } from '../utils/errors.js';

export interface RetryOptions {
  backendId: string;
  logger: winston.Logger;
  /** Retries after the first attempt (default 5) */
  maxRetries?: number;
  /** Upper bound for a single wait (default 60s, one token window) */
  maxWaitSeconds?: number;
  signal?: AbortSignal;
}

/**
 * Retry a provider call on rate limits only
 *
 * Waits for the Retry-After value when the provider sends one, otherwise
 * backs off exponentially (2s, 4s, 8s, ...). Any other failure, or the last
 * rate limit, is rethrown as a BackendError.
 */
export async function retryOnRateLimit<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxRetries = options.maxRetries ?? 5;
  const maxWaitSeconds = options.maxWaitSeconds ?? 60;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const backendError = toBackendError(options.backendId, error);

      if (!(backendError instanceof RateLimitError) || attempt >= maxRetries) {
        throw backendError;
      }

      let waitSeconds: number;
      if (backendError.retryAfterSeconds !== undefined) {
        waitSeconds = backendError.retryAfterSeconds;
        options.logger.info('Rate limit hit, using Retry-After header', {
          waitSeconds,
          attempt: attempt + 1,
          maxRetries,
        });
      } else {
        waitSeconds = Math.pow(2, attempt + 1) + Math.random() * 2;
        options.logger.info('Rate limit hit, using exponential backoff', {
          waitSeconds: waitSeconds.toFixed(1),
          attempt: attempt + 1,
          maxRetries,
        });
      }

      waitSeconds = Math.min(waitSeconds, maxWaitSeconds);
      await sleep(waitSeconds * 1000, undefined, { signal: options.signal });
    }
  }
}
