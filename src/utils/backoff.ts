/**
 * Retry Policy with Exponential Backoff
 *
 * Base delay doubles each attempt: 1s, 2s, 4s ... (capped at maxDelayMs).
 * Optional jitter adds +/- jitterFraction randomness. Every attempt runs
 * under its own timeout and every wait is abandoned as soon as the caller's
 * AbortSignal fires.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, first one included (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0) */
  jitterFraction: number;
}

export interface RetryPolicyConfig extends BackoffConfig {
  /** Upper bound for a single attempt in milliseconds (default: 120000) */
  attemptTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0,
  attemptTimeoutMs: 120_000,
};

/**
 * Thrown when the caller's signal aborts an attempt or a backoff wait
 */
export class RetryAbortedError extends Error {
  constructor(message: string = 'Operation cancelled') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Thrown when a single attempt exceeds attemptTimeoutMs
 */
export class AttemptTimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    public readonly attempt: number
  ) {
    super(`Attempt ${attempt} timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/**
 * Calculate delay for a given attempt (0-indexed).
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 *
 * @returns Delay in milliseconds (always >= 0)
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_RETRY_POLICY, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Sleep that rejects with RetryAbortedError when the signal fires
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetryAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RetryAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryAttempt {
  /** 1-indexed attempt number */
  attempt: number;
  /** Aborted when the attempt times out or the caller cancels */
  signal: AbortSignal;
}

export interface RetryNotice {
  /** The attempt that failed (1-indexed) */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  signal?: AbortSignal;
  /** Predicate for transient errors; everything else is re-thrown at once */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (notice: RetryNotice) => void;
  /** Log prefix */
  label?: string;
}

/**
 * Retry policy, independent of what is being retried
 */
export class RetryPolicy {
  readonly config: RetryPolicyConfig;

  constructor(config?: Partial<RetryPolicyConfig>) {
    this.config = { ...DEFAULT_RETRY_POLICY, ...config };
  }

  /** Delay after the given failed attempt (0-indexed) */
  delayFor(attempt: number): number {
    return calculateBackoffDelay(attempt, this.config);
  }

  /**
   * Execute fn until it succeeds, fails with a non-retryable error, or
   * maxAttempts is exhausted. The last error is re-thrown.
   */
  async execute<T>(fn: (attempt: RetryAttempt) => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const { signal, shouldRetry = () => true, onRetry, label = 'Retry' } = options;
    const { maxAttempts } = this.config;
    let lastError: unknown = new Error('No attempts were made');

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (signal?.aborted) throw new RetryAbortedError();

      try {
        return await this.runAttempt(fn, attempt + 1, signal);
      } catch (error) {
        if (error instanceof RetryAbortedError) throw error;
        lastError = error;

        if (!shouldRetry(error) || attempt >= maxAttempts - 1) throw error;

        const delayMs = this.delayFor(attempt);
        const message = error instanceof Error ? error.message : String(error);
        console.error(
          `[${label}] Attempt ${attempt + 1}/${maxAttempts} failed: ${message}. Retrying in ${delayMs}ms...`
        );
        onRetry?.({ attempt: attempt + 1, delayMs, error });
        await abortableSleep(delayMs, signal);
      }
    }

    throw lastError;
  }

  private runAttempt<T>(
    fn: (attempt: RetryAttempt) => Promise<T>,
    attempt: number,
    outer?: AbortSignal
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.config.attemptTimeoutMs;

    return new Promise<T>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        outer?.removeEventListener('abort', onAbort);
      };
      const onAbort = () => {
        cleanup();
        const cancelled = new RetryAbortedError();
        controller.abort(cancelled);
        reject(cancelled);
      };
      const timer = setTimeout(() => {
        cleanup();
        const timedOut = new AttemptTimeoutError(timeoutMs, attempt);
        controller.abort(timedOut);
        reject(timedOut);
      }, timeoutMs);
      outer?.addEventListener('abort', onAbort, { once: true });

      fn({ attempt, signal: controller.signal }).then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    });
  }
}
