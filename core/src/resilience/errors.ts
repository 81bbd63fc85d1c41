/**
 * Error classes for the resilience pipeline
 *
 * Every failure the pipeline itself raises carries a stable code and
 * structured details, so outer layers and observers can classify it without
 * matching on messages.
 *
 * @module resilience/errors
 */

import type { ErrorKind } from "@stalwart/types";

/**
 * Base class for errors raised by the pipeline
 */
export class ResilienceError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown by the circuit breaker when a call is rejected without being run
 *
 * Raised while the circuit is open, or while it is half-open and the single
 * probe is already in flight. Never retried.
 */
export class BrokenCircuitError extends ResilienceError {
  public readonly lastError: unknown;

  constructor(
    message = "Circuit is open, call rejected",
    lastError?: unknown,
    code = "CIRCUIT_OPEN"
  ) {
    super(message, code, {
      lastError: describeError(lastError),
    });
    this.lastError = lastError;
  }
}

/**
 * Thrown while the circuit has been manually isolated
 */
export class IsolatedCircuitError extends BrokenCircuitError {
  constructor() {
    super(
      "Circuit is manually isolated, call rejected",
      undefined,
      "CIRCUIT_ISOLATED"
    );
  }
}

/**
 * Thrown by the retry policy once every allowed attempt has failed
 */
export class RetryExhaustedError extends ResilienceError {
  public readonly lastError: unknown;
  public readonly attempts: number;

  constructor(lastError: unknown, attempts: number) {
    super(
      `Action failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(lastError)}`,
      "RETRY_EXHAUSTED",
      {
        attempts,
        lastError: describeError(lastError),
      }
    );
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

/**
 * Thrown when the fallback action itself fails
 *
 * The only failure that leaves the pipeline.
 */
export class FallbackActionError extends ResilienceError {
  public readonly fallbackError: unknown;
  public readonly originalError: unknown;

  constructor(fallbackError: unknown, originalError: unknown) {
    super(
      `Fallback action failed: ${describeError(fallbackError)}`,
      "FALLBACK_FAILED",
      {
        fallbackError: describeError(fallbackError),
        originalError: describeError(originalError),
      }
    );
    this.fallbackError = fallbackError;
    this.originalError = originalError;
  }
}

/**
 * Thrown when the caller aborts an execution
 */
export class ExecutionCancelledError extends ResilienceError {
  constructor(reason?: unknown) {
    super("Execution was cancelled", "EXECUTION_CANCELLED", {
      reason: describeError(reason),
    });
  }
}

/**
 * Thrown when a pipeline configuration fails validation
 */
export class PolicyConfigError extends ResilienceError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(
      `Invalid resilience configuration: ${errors.join("; ")}`,
      "INVALID_CONFIG",
      { errors }
    );
    this.errors = errors;
  }
}

/**
 * Classify an error for diagnostics
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof IsolatedCircuitError) {
    return "circuit_isolated";
  }
  if (error instanceof BrokenCircuitError) {
    return "circuit_open";
  }
  if (error instanceof RetryExhaustedError) {
    return "retry_exhausted";
  }
  if (error instanceof FallbackActionError) {
    return "fallback_failed";
  }
  if (error instanceof ExecutionCancelledError) {
    return "cancelled";
  }
  return "action_failure";
}

/**
 * Render an unknown thrown value as a short message
 */
export function describeError(error: unknown): string | undefined {
  if (error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Throw if the signal has been aborted
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ExecutionCancelledError(signal.reason);
  }
}
