/**
 * Error taxonomy for the pipelines
 *
 * fatal        - abort the run (bad credentials, missing deployment, unreachable channel)
 * transient    - retry with backoff; exhaustion skips the unit of work
 * data_quality - skip the unit of work, never retried
 */

export type ErrorKind = 'fatal' | 'transient' | 'data_quality';

export interface PipelineErrorOptions {
  statusCode?: number;
  cause?: unknown;
}

/**
 * Base error carrying its classification
 */
export class PipelineError extends Error {
  readonly statusCode?: number;

  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options: PipelineErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.statusCode = options.statusCode;
  }
}

/**
 * Credentials were rejected (expired or invalid token, missing permission)
 */
export class AuthenticationError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, 'fatal', options);
    this.name = 'AuthenticationError';
  }
}

/**
 * Temporary upstream failure: 5xx, timeout, dropped connection
 */
export class TransientError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, 'transient', options);
    this.name = 'TransientError';
  }
}

/**
 * Upstream throttled the request (429)
 */
export class RateLimitError extends TransientError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    options: PipelineErrorOptions = {}
  ) {
    super(message, { statusCode: 429, ...options });
    this.name = 'RateLimitError';
  }
}

/**
 * Input or output that cannot be used: malformed message, unparseable model reply
 */
export class DataQualityError extends PipelineError {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {},
    options: PipelineErrorOptions = {}
  ) {
    super(message, 'data_quality', options);
    this.name = 'DataQualityError';
  }
}

/**
 * Classify any thrown value
 * Errors raised by fetch itself (timeouts, aborted or failed connections) are transient
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof PipelineError) {
    return error.kind;
  }

  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return 'transient';
    }
    if (error instanceof TypeError && error.message === 'fetch failed') {
      return 'transient';
    }
  }

  return 'fatal';
}

/**
 * Type guard for errors that must abort the run
 */
export function isFatalError(error: unknown): boolean {
  return classifyError(error) === 'fatal';
}

/**
 * Readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
