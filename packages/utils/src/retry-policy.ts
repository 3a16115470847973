/**
 * Retry Policy
 * ============
 * Exponential backoff applied explicitly at a call site.
 *
 * Only errors the predicate accepts are retried (transient provider errors by
 * default); anything else propagates on the first failure. A provider's
 * Retry-After hint lengthens the wait, up to maxDelayMs.
 */

import { handleError } from './error-handler.js';
import { ProviderTransientError, isRetryableError } from './errors.js';
import { logger } from './logger.js';

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryPolicyOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  multiplier?: number;
  maxDelayMs?: number;
  /** Fraction (0-1) of the delay randomised in either direction */
  jitter?: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: SleepFn;
  random?: () => number;
}

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 2000;
    this.multiplier = options.multiplier ?? 2;
    this.maxDelayMs = options.maxDelayMs ?? 10000;
    this.jitter = Math.min(1, Math.max(0, options.jitter ?? 0));
    this.isRetryable = options.isRetryable ?? isRetryableError;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Delay before the retry that follows the given (1-based) failed attempt
   */
  delayFor(attempt: number, error?: unknown): number {
    const raw = Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(this.multiplier, attempt - 1));
    const backoff =
      this.jitter === 0
        ? raw
        : Math.max(0, Math.round(raw - raw * this.jitter + this.random() * 2 * raw * this.jitter));

    const retryAfterMs = error instanceof ProviderTransientError ? error.retryAfterMs : undefined;
    if (retryAfterMs === undefined || !Number.isFinite(retryAfterMs)) {
      return backoff;
    }
    return Math.max(backoff, Math.min(this.maxDelayMs, retryAfterMs));
  }

  async execute<T>(fn: () => Promise<T>, context?: Record<string, unknown>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;

        if (!this.isRetryable(error)) {
          throw error;
        }
        if (attempt === this.maxAttempts) {
          break;
        }

        const delayMs = this.delayFor(attempt, error);
        logger.debug('Retrying after transient error', {
          attempt,
          maxAttempts: this.maxAttempts,
          delayMs,
          ...context,
        });
        await this.sleep(delayMs);
      }
    }

    // All retries exhausted
    handleError(lastError, { ...context, maxAttempts: this.maxAttempts });
    throw lastError;
  }
}
