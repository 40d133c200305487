/**
 * @fileoverview Async Utilities
 *
 * Timeouts and backoff retries for collaborator I/O, plus event-loop yielding.
 *
 * @packageDocumentation
 */

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Custom error code to attach to timeout errors */
  errorCode?: string;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly code?: string;
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string, errorCode?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.code = errorCode;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param timeoutMs - if <= 0 or undefined, the promise is returned as-is
 * @throws TimeoutError if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const session = await withTimeout(store.getSession(id), 250, { context: 'getSession' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context, options?.errorCode));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Resolve on the next turn of the event loop, after pending I/O callbacks. */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface RetryOptions {
  /** Extra attempts after the first one (default: 1) */
  retries?: number;
  /** Delay before the first retry; doubles on each further retry (default: 50) */
  baseDelayMs?: number;
  /** Only errors accepted here are retried */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn`, retrying with exponential backoff on accepted errors.
 * The last error is rethrown when attempts run out.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const retries = Math.max(0, options.retries ?? 1);
  const baseDelayMs = Math.max(0, options.baseDelayMs ?? 50);
  const shouldRetry = options.shouldRetry ?? (() => true);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = baseDelayMs * 2 ** attempt;
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}
