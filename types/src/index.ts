/**
 * Shared type contracts for the stalwart resilience pipeline
 *
 * @module @stalwart/types
 */

/**
 * Action - The fallible operation protected by the pipeline
 *
 * Receives the caller's abort signal so it can stop work when the caller
 * abandons the execution. Functions that ignore the signal are assignable.
 */
export type Action<T = void> = (signal: AbortSignal) => Promise<T> | T;

/**
 * CircuitState - State of a circuit breaker
 * - closed: Normal operation, calls pass through and outcomes are sampled
 * - open: Failure ratio exceeded, calls are rejected until the break elapses
 * - half_open: One probe call is allowed through to test recovery
 * - isolated: Manually held open until reset
 */
export type CircuitState = "closed" | "open" | "half_open" | "isolated";

/**
 * ResiliencePipelineConfig - Configuration surface of the pipeline
 *
 * All fields are required at construction. Durations are milliseconds.
 */
export interface ResiliencePipelineConfig {
  /**
   * Retries after the first attempt (0 = no retry)
   */
  maxRetryCount: number;

  /**
   * Base of the exponential backoff: wait = baseDelayMs * 2^attempt + jitter
   */
  baseDelayMs: number;

  /**
   * Upper bound (exclusive) of the random jitter added to each wait
   */
  jitterMaxMs: number;

  /**
   * Failure ratio (0-1) within the sampling window that breaks the circuit
   */
  failureThreshold: number;

  /**
   * Length of the rolling window over which outcomes are counted
   */
  samplingDurationMs: number;

  /**
   * How long the circuit stays open before a probe is allowed
   */
  breakDurationMs: number;

  /**
   * Calls that must be seen within the window before the circuit may break
   */
  minimumThroughput: number;
}

/**
 * HealthCount - Outcome counts within the current sampling window
 */
export interface HealthCount {
  successes: number;
  failures: number;
  total: number;
}

/**
 * ErrorKind - Classification of a failure reaching an outer layer
 */
export type ErrorKind =
  | "action_failure"
  | "circuit_open"
  | "circuit_isolated"
  | "retry_exhausted"
  | "fallback_failed"
  | "cancelled";

/**
 * RetryHandler - Called before each backoff wait
 *
 * @param attempt - Retry number, 1 for the first retry
 */
export type RetryHandler = (
  error: unknown,
  waitMs: number,
  attempt: number
) => void;

/**
 * BreakHandler - Called when the circuit transitions to open
 */
export type BreakHandler = (error: unknown, breakDurationMs: number) => void;

/**
 * FallbackHandler - Called before the fallback action replaces a failure
 */
export type FallbackHandler = (error: unknown, kind: ErrorKind) => void;

/**
 * PipelineObservers - Diagnostic hooks
 *
 * Hooks are side-effect only. Their return values are ignored and an
 * exception thrown from a hook never changes the outcome of an execution.
 */
export interface PipelineObservers {
  onRetry?: RetryHandler;
  onBreak?: BreakHandler;
  onReset?: () => void;
  onHalfOpen?: () => void;
  onFallback?: FallbackHandler;
}

/**
 * PolicyResult - Captured outcome of an execution that never throws
 */
export type PolicyResult<T> =
  | {
      outcome: "successful";
      result: T;
    }
  | {
      outcome: "failure";
      error: unknown;
      errorKind: ErrorKind;
    };
