/**
 * Retry policy shared by every remote call.
 *
 * The schedule is a pure function of the attempt number; the executor
 * applies it around one operation and decides when to give up.
 */

import { isRetryableError, toError } from "../error/index.js";

/**
 * Retry settings for one role (publisher or subscriber).
 *
 * A zero `totalTimeoutMs`, `maxAttempts`, `maxRetryDelayMs` or
 * `initialRpcTimeoutMs` means unbounded / transport default. A zero
 * `initialRetryDelayMs` is unset and falls back to
 * {@link DEFAULT_INITIAL_RETRY_DELAY_MS}.
 */
export interface RetrySettings {
  /** Overall budget for all attempts, in milliseconds. */
  totalTimeoutMs: number;
  /** Delay before the first retry, in milliseconds. */
  initialRetryDelayMs: number;
  /** Factor applied to the delay after each retry. */
  retryDelayMultiplier: number;
  /** Upper bound for a single delay, in milliseconds. */
  maxRetryDelayMs: number;
  /** Maximum number of attempts, including the first. */
  maxAttempts: number;
  /** Replace each delay by a uniform random value in [0, delay]. */
  jittered: boolean;
  /** Timeout of the first attempt, in milliseconds. */
  initialRpcTimeoutMs: number;
  /** Factor applied to the attempt timeout after each attempt. */
  rpcTimeoutMultiplier: number;
  /** Upper bound for a single attempt timeout, in milliseconds. */
  maxRpcTimeoutMs: number;
}

/**
 * Delay before the first retry when `initialRetryDelayMs` is unset.
 */
export const DEFAULT_INITIAL_RETRY_DELAY_MS = 100;

/**
 * Default retry settings.
 */
export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  totalTimeoutMs: 0,
  initialRetryDelayMs: 0,
  retryDelayMultiplier: 1,
  maxRetryDelayMs: 0,
  maxAttempts: 0,
  jittered: true,
  initialRpcTimeoutMs: 0,
  rpcTimeoutMultiplier: 1,
  maxRpcTimeoutMs: 0,
};

/**
 * Context handed to each attempt.
 */
export interface AttemptContext {
  /** 1-based attempt number. */
  attempt: number;
  /** Timeout for this attempt; undefined leaves it to the transport. */
  timeoutMs?: number;
}

/**
 * Retry hook callbacks.
 */
export interface RetryHooks {
  /** Called before waiting for the next attempt. */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when the schedule gives up on a retryable error. */
  onExhausted?: (error: Error, attempts: number) => void;
}

/**
 * Derived retry schedule.
 */
export class RetrySchedule {
  constructor(private readonly settings: RetrySettings) {}

  /**
   * Unjittered delay before retry number `retry` (1-based).
   */
  retryDelay(retry: number): number {
    const { initialRetryDelayMs, retryDelayMultiplier, maxRetryDelayMs } = this.settings;
    const initial = initialRetryDelayMs > 0 ? initialRetryDelayMs : DEFAULT_INITIAL_RETRY_DELAY_MS;
    const delay = initial * Math.pow(retryDelayMultiplier, Math.max(0, retry - 1));
    return maxRetryDelayMs > 0 ? Math.min(delay, maxRetryDelayMs) : delay;
  }

  /**
   * Timeout for attempt number `attempt` (1-based), if one applies.
   */
  rpcTimeout(attempt: number): number | undefined {
    const { initialRpcTimeoutMs, rpcTimeoutMultiplier, maxRpcTimeoutMs } = this.settings;
    if (initialRpcTimeoutMs <= 0) {
      return undefined;
    }
    const timeout = initialRpcTimeoutMs * Math.pow(rpcTimeoutMultiplier, Math.max(0, attempt - 1));
    return maxRpcTimeoutMs > 0 ? Math.min(timeout, maxRpcTimeoutMs) : timeout;
  }

  /**
   * Whether another attempt is allowed after `attempts` have been made.
   */
  hasAttemptsLeft(attempts: number): boolean {
    return this.settings.maxAttempts <= 0 || attempts < this.settings.maxAttempts;
  }
}

/**
 * Retry executor options.
 */
export interface RetryExecutorOptions {
  hooks?: RetryHooks;
  /** Classifies errors; defaults to the error's `retryable` flag. */
  isRetryable?: (error: Error) => boolean;
  /** Source of jitter, uniform in [0, 1). */
  random?: () => number;
  now?: () => number;
}

/**
 * Retry executor for remote calls.
 */
export class RetryExecutor {
  readonly schedule: RetrySchedule;
  private readonly settings: RetrySettings;
  private readonly hooks: RetryHooks;
  private readonly isRetryable: (error: Error) => boolean;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(settings: RetrySettings, options: RetryExecutorOptions = {}) {
    this.settings = settings;
    this.schedule = new RetrySchedule(settings);
    this.hooks = options.hooks ?? {};
    this.isRetryable = options.isRetryable ?? isRetryableError;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * Executes an operation, retrying retryable failures.
   *
   * An aborted `signal` ends the wait between attempts and no further
   * attempt is made.
   *
   * @throws The first non-retryable error, or the last error once the
   *   schedule is exhausted or `signal` aborts.
   */
  async execute<T>(operation: (context: AttemptContext) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const startedAt = this.now();
    const { totalTimeoutMs, jittered } = this.settings;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation({ attempt, timeoutMs: this.attemptTimeout(attempt, startedAt) });
      } catch (thrown) {
        const error = toError(thrown);

        if (!this.isRetryable(error) || signal?.aborted) {
          throw error;
        }

        if (!this.schedule.hasAttemptsLeft(attempt)) {
          this.hooks.onExhausted?.(error, attempt);
          throw error;
        }

        const baseDelay = this.schedule.retryDelay(attempt);
        const delayMs = jittered ? this.random() * baseDelay : baseDelay;

        if (totalTimeoutMs > 0 && this.now() - startedAt + delayMs >= totalTimeoutMs) {
          this.hooks.onExhausted?.(error, attempt);
          throw error;
        }

        this.hooks.onRetry?.(attempt, error, delayMs);
        await sleep(delayMs, signal);
        if (signal?.aborted) {
          throw error;
        }
      }
    }
  }

  private attemptTimeout(attempt: number, startedAt: number): number | undefined {
    const timeout = this.schedule.rpcTimeout(attempt);
    if (this.settings.totalTimeoutMs <= 0) {
      return timeout;
    }
    const remaining = Math.max(1, this.settings.totalTimeoutMs - (this.now() - startedAt));
    return timeout === undefined ? remaining : Math.min(timeout, remaining);
  }
}

/**
 * Creates a retry executor, filling unset settings from the defaults.
 */
export function createRetryExecutor(
  settings: Partial<RetrySettings> = {},
  options: RetryExecutorOptions = {}
): RetryExecutor {
  return new RetryExecutor({ ...DEFAULT_RETRY_SETTINGS, ...settings }, options);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
