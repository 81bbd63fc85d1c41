/**
 * Retry Policy
 *
 * Re-invokes a failing action after an exponential backoff wait, up to a
 * bounded number of retries. Attempts of one execution are strictly
 * sequential; the wait suspends only the execution that is retrying.
 *
 * @module resilience/retry
 */

import type { Action, RetryHandler } from "@stalwart/types";
import type { BackoffProvider } from "./backoff.js";
import {
  BrokenCircuitError,
  ExecutionCancelledError,
  RetryExhaustedError,
  throwIfCancelled,
} from "./errors.js";
import { notify } from "./observers.js";

/**
 * RetryPolicyOptions - Configuration for retry behavior
 */
export interface RetryPolicyOptions {
  /**
   * Retries after the first attempt (0 = no retry)
   */
  maxRetryCount: number;

  /**
   * Wait before retry n, where n starts at 1
   */
  backoff: BackoffProvider;

  /**
   * Decides which failures are retried (default: isRetryableError)
   */
  shouldRetry?: (error: unknown) => boolean;

  /**
   * Called before each wait
   */
  onRetry?: RetryHandler;
}

/**
 * Check if an error should trigger a retry
 *
 * Rejections from an open circuit are never retried: retrying against an open
 * breaker only repeats the rejection. Cancellation is never retried either.
 */
export function isRetryableError(error: unknown): boolean {
  return !(
    error instanceof BrokenCircuitError ||
    error instanceof ExecutionCancelledError
  );
}

/**
 * Longest delay a single timer accepts (2^31 - 1 ms)
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Promise-based sleep that can be interrupted
 *
 * Rejects with ExecutionCancelledError as soon as the signal aborts, and
 * clears the pending timer so nothing runs afterwards.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * await sleep(1000, controller.signal);
 * ```
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ExecutionCancelledError(signal.reason));
      return;
    }

    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      reject(new ExecutionCancelledError(signal?.reason));
    };

    // Waits longer than one timer can hold run as consecutive timers
    const schedule = () => {
      const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= delay;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, delay);
    };

    schedule();
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * RetryPolicy - Wait-and-retry around an action
 *
 * @example
 * ```typescript
 * const retry = new RetryPolicy({
 *   maxRetryCount: 3,
 *   backoff: createBackoffProvider({ baseDelayMs: 100, jitterMaxMs: 300 }),
 *   onRetry: (error, waitMs, attempt) => console.log(`retry ${attempt}`),
 * });
 *
 * await retry.execute(() => callDependency());
 * ```
 */
export class RetryPolicy {
  private readonly _maxRetryCount: number;
  private readonly _backoff: BackoffProvider;
  private readonly _shouldRetry: (error: unknown) => boolean;
  private readonly _onRetry?: RetryHandler;

  constructor(options: RetryPolicyOptions) {
    this._maxRetryCount = options.maxRetryCount;
    this._backoff = options.backoff;
    this._shouldRetry = options.shouldRetry ?? isRetryableError;
    this._onRetry = options.onRetry;
  }

  get maxRetryCount(): number {
    return this._maxRetryCount;
  }

  /**
   * Execute an action, retrying qualifying failures
   *
   * @throws The failure unchanged when it is not retryable
   * @throws RetryExhaustedError when the last allowed attempt fails
   * @throws ExecutionCancelledError when the signal aborts
   */
  async execute<T>(
    action: Action<T>,
    signal: AbortSignal = new AbortController().signal
  ): Promise<T> {
    let retries = 0;

    for (;;) {
      throwIfCancelled(signal);

      try {
        return await action(signal);
      } catch (error) {
        throwIfCancelled(signal);
        if (!this._shouldRetry(error)) {
          throw error;
        }
        if (retries >= this._maxRetryCount) {
          throw new RetryExhaustedError(error, retries + 1);
        }

        retries++;
        const waitMs = this._backoff(retries);
        notify("onRetry", this._onRetry, error, waitMs, retries);

        await sleep(waitMs, signal);
      }
    }
  }

  /**
   * Wrap an action so every invocation runs through this policy
   */
  wrap<T>(action: Action<T>): Action<T> {
    return (signal) => this.execute(action, signal);
  }
}
