/**
 * Retry policy shared by the Graph client and the completion calls
 *
 * Only transient errors are retried. A rate-limit hint from the server
 * takes precedence over exponential backoff.
 */

import { EventEmitter } from 'events';
import { RateLimitError, classifyError, errorMessage } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum backoff delay in milliseconds */
  maxDelayMs: number;
  /** Backoff multiplier */
  backoffMultiplier: number;
  /** Whether to add jitter to backoff delays */
  jitter: boolean;
  /** Upper bound for a server-provided retry-after */
  maxRetryAfterMs: number;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  maxRetryAfterMs: 120000,
};

/**
 * Payload of the retry:scheduled event
 */
export interface RetryScheduledEvent {
  operation: string;
  attempt: number;
  nextAttempt: number;
  delayMs: number;
  error: string;
  context?: Record<string, unknown>;
}

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Calculate delay with exponential backoff
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig
): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  let delay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    // Add random jitter (0-25% of delay)
    const jitterAmount = delay * 0.25 * Math.random();
    delay += jitterAmount;
  }

  return Math.floor(delay);
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds
 */
export function parseRetryAfter(
  header: string | null | undefined,
  now: number = Date.now()
): number | undefined {
  if (!header) return undefined;

  const value = header.trim();
  if (/^\d+(\.\d+)?$/.test(value)) {
    return Math.round(parseFloat(value) * 1000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;

  return Math.max(0, date - now);
}

/**
 * Delay before the next attempt
 */
export function resolveRetryDelay(
  error: unknown,
  attempt: number,
  config: RetryConfig
): number {
  if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, config.maxRetryAfterMs);
  }
  return calculateBackoffDelay(attempt, config);
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return classifyError(error) === 'transient';
}

export interface RetryPolicyOptions {
  sleep?: SleepFn;
}

/**
 * Retry policy
 * Emits `retry:scheduled` before every wait
 */
export class RetryPolicy extends EventEmitter {
  private readonly config: RetryConfig;
  private readonly sleepFn: SleepFn;

  constructor(config: Partial<RetryConfig> = {}, options: RetryPolicyOptions = {}) {
    super();
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.sleepFn = options.sleep ?? sleep;
  }

  /**
   * Execute an operation, retrying transient failures
   * The last error propagates once attempts are exhausted
   */
  async execute<T>(
    operation: string,
    fn: (attempt: number) => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const log = createLogger({ module: 'retry' });
    let attempt = 0;

    while (true) {
      attempt++;

      try {
        return await fn(attempt);
      } catch (error) {
        if (!isRetryableError(error) || attempt >= this.config.maxAttempts) {
          throw error;
        }

        const delayMs = resolveRetryDelay(error, attempt, this.config);
        const event: RetryScheduledEvent = {
          operation,
          attempt,
          nextAttempt: attempt + 1,
          delayMs,
          error: errorMessage(error),
          context,
        };

        log.warn(event, `Retrying ${operation} in ${delayMs}ms (attempt ${attempt + 1}/${this.config.maxAttempts})`);
        this.emit('retry:scheduled', event);

        await this.sleepFn(delayMs);
      }
    }
  }
}

/**
 * Create a retry policy instance
 */
export function createRetryPolicy(
  config?: Partial<RetryConfig>,
  options?: RetryPolicyOptions
): RetryPolicy {
  return new RetryPolicy(config, options);
}
