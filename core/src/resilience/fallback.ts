/**
 * Fallback Policy
 *
 * Replaces any failure of the wrapped callable with the result of a
 * substitute action. The substitute is not itself protected.
 *
 * @module resilience/fallback
 */

import type { Action, FallbackHandler } from "@stalwart/types";
import { classifyError, FallbackActionError, throwIfCancelled } from "./errors.js";
import { notify } from "./observers.js";

/**
 * Substitute run in place of a failed execution
 */
export type FallbackAction<T> = (
  error: unknown,
  signal: AbortSignal
) => Promise<T> | T;

export interface FallbackPolicyOptions<T> {
  fallbackAction: FallbackAction<T>;
  onFallback?: FallbackHandler;
}

export class FallbackPolicy<T> {
  private readonly _fallbackAction: FallbackAction<T>;
  private readonly _onFallback?: FallbackHandler;

  constructor(options: FallbackPolicyOptions<T>) {
    this._fallbackAction = options.fallbackAction;
    this._onFallback = options.onFallback;
  }

  /**
   * Execute the callable, substituting the fallback result on failure
   *
   * A caller that has already aborted gets its failure back and the fallback
   * is not run.
   *
   * @throws FallbackActionError when the fallback action fails
   */
  async execute(
    action: Action<T>,
    signal: AbortSignal = new AbortController().signal
  ): Promise<T> {
    throwIfCancelled(signal);

    try {
      return await action(signal);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }

      notify("onFallback", this._onFallback, error, classifyError(error));

      try {
        return await this._fallbackAction(error, signal);
      } catch (fallbackError) {
        throw new FallbackActionError(fallbackError, error);
      }
    }
  }

  wrap(action: Action<T>): Action<T> {
    return (signal) => this.execute(action, signal);
  }
}
