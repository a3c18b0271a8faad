import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from '../bootstrap/logger.js';
import { noopLogger } from '../bootstrap/logger.js';
import { describeError } from '../errors.js';
import { RETRY_BASE_DELAY_MS, RETRY_JITTER_MS, RETRY_MAX_DELAY_MS } from '../config.js';

export interface RetryOptions {
  readonly attempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterMs: number;
  readonly shouldRetry?: (error: unknown) => boolean;
  readonly logger?: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  attempts: 3,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  jitterMs: RETRY_JITTER_MS,
};

export function computeBackoff(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'>,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
  const jitter = options.jitterMs > 0 ? random() * options.jitterMs : 0;
  return Math.round(exponential + jitter);
}

/**
 * Runs `task` up to `attempts` times, sleeping with exponential backoff plus
 * jitter in between. Errors rejected by `shouldRetry` propagate immediately.
 */
export async function withRetry<T>(
  label: string,
  task: (attempt: number) => Promise<T>,
  overrides: Partial<RetryOptions> = {},
): Promise<T> {
  const options: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...overrides };
  const attempts = Math.max(1, Math.trunc(options.attempts));
  const logger = options.logger ?? noopLogger;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await task(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt + 1 >= attempts) {
        throw error;
      }

      const waitMs = computeBackoff(attempt, options);
      logger.warn(`[retry] ${label} falló, reintentando`, {
        attempt: attempt + 1,
        attempts,
        waitMs,
        error: describeError(error),
      });
      await sleep(waitMs);
    }
  }
}
