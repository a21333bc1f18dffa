import { Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import { formatErrorMessage, TransientFetchError } from '../common/errors';

export interface RetryPolicyOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  factor: 2,
};

/**
 * Bounded exponential backoff around one unit of work.
 *
 * Only TransientFetchError is retried; anything else is rethrown on the
 * spot. When attempts run out the last transient error is rethrown.
 * Waiting between attempts is cut short by `signal`.
 */
export class RetryPolicy {
  private readonly logger = new Logger(RetryPolicy.name);

  constructor(readonly options: RetryPolicyOptions = DEFAULT_RETRY_POLICY) {}

  /**
   * Delay before attempt `attempt + 1`, for `attempt` >= 1.
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, factor, maxDelayMs } = this.options;
    return Math.min(maxDelayMs, baseDelayMs * Math.pow(factor, attempt - 1));
  }

  async execute<T>(
    label: string,
    work: (attempt: number) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await work(attempt);
      } catch (error) {
        if (!(error instanceof TransientFetchError)) {
          throw error;
        }
        if (attempt >= maxAttempts || signal?.aborted) {
          throw error;
        }

        const delay = this.delayFor(attempt);
        this.logger.warn(
          `${label}: attempt ${attempt}/${maxAttempts} failed (${formatErrorMessage(error)}), retrying in ${delay}ms`,
        );
        try {
          await sleep(delay, undefined, { signal });
        } catch {
          // aborted while backing off
          throw error;
        }
      }
    }
  }
}
