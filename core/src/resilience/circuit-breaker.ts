/**
 * Circuit Breaker Implementation
 *
 * Failure-ratio circuit breaker. Outcomes are sampled over a rolling window;
 * once enough calls have been seen and the failure ratio reaches the
 * threshold, the circuit opens and rejects calls for the break duration.
 * After that a single probe is let through: its success closes the circuit,
 * its failure opens it again.
 *
 * State machine:
 *   closed    → (throughput ≥ minimum AND ratio ≥ threshold) → open
 *   open      → (break duration elapsed, next call or read)   → half_open
 *   half_open → (probe succeeds)                              → closed
 *   half_open → (probe fails)                                 → open
 *   any       → isolate()                                     → isolated
 *   any       → reset()                                       → closed
 *
 * Every read-check-write of the state happens inside one synchronous method,
 * so concurrent executions can never observe a transition half done and the
 * half-open probe slot is claimed by exactly one caller.
 *
 * @module resilience/circuit-breaker
 */

import type {
  Action,
  BreakHandler,
  CircuitState,
  HealthCount,
} from "@stalwart/types";
import {
  BrokenCircuitError,
  ExecutionCancelledError,
  IsolatedCircuitError,
  throwIfCancelled,
} from "./errors.js";
import { notify } from "./observers.js";
import { RollingWindowStats } from "./rolling-window.js";

/**
 * CircuitBreakerOptions - Thresholds and hooks of a breaker
 */
export interface CircuitBreakerOptions {
  /**
   * Failure ratio (0-1) within the sampling window that opens the circuit
   */
  failureThreshold: number;

  /**
   * Length of the rolling window in milliseconds
   */
  samplingDurationMs: number;

  /**
   * Time the circuit stays open before a probe is allowed (ms)
   */
  breakDurationMs: number;

  /**
   * Calls required within the window before the circuit may open
   */
  minimumThroughput: number;

  /**
   * Decides which errors count as failures (default: all but cancellation)
   */
  shouldHandle?: (error: unknown) => boolean;

  onBreak?: BreakHandler;
  onReset?: () => void;
  onHalfOpen?: () => void;
}

const countsAsFailure = (error: unknown): boolean =>
  !(error instanceof ExecutionCancelledError);

/**
 * CircuitBreakerPolicy - Breaker owning its state and rolling statistics
 *
 * @example
 * ```typescript
 * const breaker = new CircuitBreakerPolicy({
 *   failureThreshold: 0.25,
 *   samplingDurationMs: 30_000,
 *   breakDurationMs: 10_000,
 *   minimumThroughput: 64,
 * });
 *
 * await breaker.execute(() => callDependency());
 * ```
 */
export class CircuitBreakerPolicy {
  private readonly _options: CircuitBreakerOptions;
  private readonly _shouldHandle: (error: unknown) => boolean;
  private readonly _stats: RollingWindowStats;

  private _state: CircuitState = "closed";
  private _blockedUntil = 0;
  private _lastError: unknown = undefined;
  private _probeSequence = 0;
  private _activeProbe: number | null = null;

  constructor(options: CircuitBreakerOptions) {
    this._options = options;
    this._shouldHandle = options.shouldHandle ?? countsAsFailure;
    this._stats = new RollingWindowStats(options.samplingDurationMs);
  }

  /**
   * Current state; an open circuit whose break has elapsed reads as half_open
   */
  get state(): CircuitState {
    this.refreshState();
    return this._state;
  }

  /**
   * Error that last opened the circuit
   */
  get lastError(): unknown {
    return this._lastError;
  }

  /**
   * Outcome counts inside the current sampling window
   */
  getHealth(): HealthCount {
    return this._stats.getHealthCount();
  }

  /**
   * Hold the circuit open until reset() is called
   */
  isolate(): void {
    const error = new IsolatedCircuitError();
    this._state = "isolated";
    this._activeProbe = null;
    this._lastError = error;
    notify(
      "onBreak",
      this._options.onBreak,
      error,
      Number.POSITIVE_INFINITY
    );
  }

  /**
   * Close the circuit and clear its statistics
   */
  reset(): void {
    this.close();
  }

  /**
   * Execute an action through the breaker
   *
   * @throws BrokenCircuitError when the call is rejected without running
   * @throws The action's own error, after it has been counted
   */
  async execute<T>(
    action: Action<T>,
    signal: AbortSignal = new AbortController().signal
  ): Promise<T> {
    throwIfCancelled(signal);
    const probe = this.admit();

    let result: T;
    try {
      result = await action(signal);
    } catch (error) {
      if (signal.aborted || !this._shouldHandle(error)) {
        this.releaseProbe(probe);
      } else {
        this.onActionFailure(error, probe);
      }
      throw error;
    }

    this.onActionSuccess(probe);
    return result;
  }

  /**
   * Wrap an action so every invocation runs through this breaker
   */
  wrap<T>(action: Action<T>): Action<T> {
    return (signal) => this.execute(action, signal);
  }

  /**
   * Admit or reject a call
   *
   * @returns Probe id when the call is the half-open probe, otherwise null
   */
  private admit(): number | null {
    this.refreshState();

    switch (this._state) {
      case "closed":
        return null;
      case "isolated":
        throw new IsolatedCircuitError();
      case "open":
        throw new BrokenCircuitError(undefined, this._lastError);
      case "half_open":
        if (this._activeProbe !== null) {
          throw new BrokenCircuitError(
            "Circuit is half-open and a probe is in flight, call rejected",
            this._lastError
          );
        }
        this._activeProbe = ++this._probeSequence;
        return this._activeProbe;
    }
  }

  private onActionSuccess(probe: number | null): void {
    if (probe !== null) {
      if (this.isActiveProbe(probe)) {
        this.close();
      }
      return;
    }

    // Late results from calls admitted before the circuit broke are ignored
    if (this._state === "closed") {
      this._stats.recordSuccess();
    }
  }

  private onActionFailure(error: unknown, probe: number | null): void {
    if (probe !== null) {
      if (this.isActiveProbe(probe)) {
        this.open(error);
      }
      return;
    }

    if (this._state !== "closed") {
      return;
    }

    this._stats.recordFailure();
    const health = this._stats.getHealthCount();
    if (
      health.total >= this._options.minimumThroughput &&
      health.failures / health.total >= this._options.failureThreshold
    ) {
      this.open(error);
    }
  }

  private isActiveProbe(probe: number): boolean {
    return this._state === "half_open" && this._activeProbe === probe;
  }

  private releaseProbe(probe: number | null): void {
    if (probe !== null && this._activeProbe === probe) {
      this._activeProbe = null;
    }
  }

  private refreshState(): void {
    if (this._state === "open" && Date.now() >= this._blockedUntil) {
      this._state = "half_open";
      this._activeProbe = null;
      notify("onHalfOpen", this._options.onHalfOpen);
    }
  }

  private open(error: unknown): void {
    this._state = "open";
    this._activeProbe = null;
    this._lastError = error;
    this._blockedUntil = Date.now() + this._options.breakDurationMs;
    notify("onBreak", this._options.onBreak, error, this._options.breakDurationMs);
  }

  private close(): void {
    this._state = "closed";
    this._activeProbe = null;
    this._stats.reset();
    notify("onReset", this._options.onReset);
  }
}
