/**
 * Retry Policy
 *
 * Stateless backoff policies and a small driver for retrying async
 * operations. A policy only answers "how long before attempt N" and
 * "may attempt N+1 happen"; the caller owns the attempt counter.
 *
 * @module retry-policy
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A pure function of attempt count, expressed as an object */
export interface RetryPolicy {
  /** Total attempts allowed, including the first one */
  readonly maxAttempts: number;

  /**
   * Delay to wait after attempt `attempt` (1-based) failed, before the next one.
   */
  delayFor(attempt: number): number;

  /**
   * Whether another attempt may be made after `attemptsMade` attempts.
   */
  canRetry(attemptsMade: number): boolean;
}

/** Jitter strategy */
export type JitterMode = 'full' | 'none';

/** Options for ExponentialBackoff */
export interface ExponentialBackoffOptions {
  /** Total attempts allowed (default: 5) */
  maxAttempts?: number;

  /** Delay after the first failure, in ms (default: 500) */
  baseDelayMs?: number;

  /** Upper bound for any single delay, in ms (default: 30000) */
  maxDelayMs?: number;

  /** `full` picks uniformly in [0, delay]; `none` is deterministic (default: full) */
  jitter?: JitterMode;

  /** Random source in [0, 1) (default: Math.random) */
  random?: () => number;
}

// ---------------------------------------------------------------------------
// ExponentialBackoff
// ---------------------------------------------------------------------------

/**
 * Exponential backoff with optional full jitter.
 *
 * delay(n) = min(maxDelayMs, baseDelayMs * 2^(n-1)), then jittered.
 *
 * @example
 * ```ts
 * const policy = new ExponentialBackoff({ maxAttempts: 10, baseDelayMs: 500 });
 * policy.delayFor(1); // somewhere in [0, 500]
 * policy.canRetry(10); // false
 * ```
 */
export class ExponentialBackoff implements RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: JitterMode;
  private readonly random: () => number;

  constructor(options?: ExponentialBackoffOptions) {
    this.maxAttempts = options?.maxAttempts ?? 5;
    this.baseDelayMs = options?.baseDelayMs ?? 500;
    this.maxDelayMs = options?.maxDelayMs ?? 30_000;
    this.jitter = options?.jitter ?? 'full';
    this.random = options?.random ?? Math.random;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
    if (this.baseDelayMs < 0 || this.maxDelayMs < 0) {
      throw new RangeError('Backoff delays must not be negative');
    }
  }

  delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    const ceiling = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** exponent);
    if (this.jitter === 'none') {
      return ceiling;
    }
    return Math.floor(this.random() * (ceiling + 1));
  }

  canRetry(attemptsMade: number): boolean {
    return attemptsMade < this.maxAttempts;
  }
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

/** Sleep function, injectable for tests */
export type SleepFn = (ms: number) => Promise<void>;

/** Default sleep backed by setTimeout */
export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Options for `retry()` */
export interface RetryOptions {
  policy: RetryPolicy;

  /** Decide whether an error is worth another attempt (default: always) */
  shouldRetry?: (err: unknown, attempt: number) => boolean;

  /** Called before sleeping ahead of the next attempt */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;

  /**
   * Latest epoch ms at which another attempt may start. Delays that would
   * cross it end the loop early.
   */
  deadline?: number;

  sleep?: SleepFn;
}

/** Error thrown by `retry()` when attempts run out */
export class RetryExhaustedError extends Error {
  override readonly name = 'RetryExhaustedError';

  /** Attempts actually made */
  readonly attempts: number;

  /** Error from the last attempt */
  readonly lastError: unknown;

  /** `attempts` when the policy ran out, `deadline` when time did */
  readonly exhausted: 'attempts' | 'deadline';

  constructor(
    attempts: number,
    lastError: unknown,
    exhausted: 'attempts' | 'deadline' = 'attempts',
  ) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempt(s): ${detail}`, { cause: lastError });
    this.attempts = attempts;
    this.lastError = lastError;
    this.exhausted = exhausted;
  }
}

/**
 * Run `operation` until it succeeds or the policy says stop.
 *
 * Errors rejected by `shouldRetry` are rethrown as-is; running out of
 * attempts (or time) throws `RetryExhaustedError`.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (err) {
      if (options.shouldRetry && !options.shouldRetry(err, attempt)) {
        throw err;
      }
      if (!options.policy.canRetry(attempt)) {
        throw new RetryExhaustedError(attempt, err);
      }
      const delay = options.policy.delayFor(attempt);
      if (options.deadline !== undefined && Date.now() + delay >= options.deadline) {
        throw new RetryExhaustedError(attempt, err, 'deadline');
      }
      options.onRetry?.(err, attempt, delay);
      await wait(delay);
    }
  }
}
