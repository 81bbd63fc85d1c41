/**
 * Resilience Pipeline
 *
 * Composes the three policies around an action in a fixed order:
 *
 *   fallback → retry → circuit breaker → action
 *
 * The breaker is innermost so every retry attempt is counted and can be
 * short-circuited individually. Retry sits inside fallback so the fallback
 * only engages once retries are exhausted or the circuit rejects the call.
 * The order is set here at construction and cannot be reconfigured.
 *
 * @module resilience/pipeline
 */

import type {
  Action,
  PipelineObservers,
  PolicyResult,
  ResiliencePipelineConfig,
} from "@stalwart/types";
import { createBackoffProvider, type RandomSource } from "./backoff.js";
import { CircuitBreakerPolicy } from "./circuit-breaker.js";
import { validatePipelineConfig } from "./config.js";
import { classifyError, PolicyConfigError } from "./errors.js";
import { FallbackPolicy, type FallbackAction } from "./fallback.js";
import { RetryPolicy } from "./retry.js";

/**
 * ResiliencePipelineOptions - Everything needed to build a pipeline
 */
export interface ResiliencePipelineOptions<T> {
  config: ResiliencePipelineConfig;

  /**
   * Substitute run when the protected path ultimately fails
   */
  fallbackAction: FallbackAction<T>;

  observers?: PipelineObservers;

  /**
   * Jitter source shared by every execution (default: Math.random)
   */
  random?: RandomSource;
}

/**
 * ResiliencePipeline - Stateless composition of fallback, retry and breaker
 *
 * The policies are built once and shared by every execution; the breaker's
 * statistics therefore span all callers of this pipeline.
 *
 * @example
 * ```typescript
 * const pipeline = createResiliencePipeline({
 *   config: DEFAULT_PIPELINE_CONFIG,
 *   fallbackAction: () => readFromCache(),
 *   observers: { onRetry: () => console.log("Retrying...") },
 * });
 *
 * const value = await pipeline.execute(() => readFromService());
 * ```
 */
export class ResiliencePipeline<T = void> {
  readonly fallback: FallbackPolicy<T>;
  readonly retry: RetryPolicy;
  readonly circuitBreaker: CircuitBreakerPolicy;

  constructor(
    fallback: FallbackPolicy<T>,
    retry: RetryPolicy,
    circuitBreaker: CircuitBreakerPolicy
  ) {
    this.fallback = fallback;
    this.retry = retry;
    this.circuitBreaker = circuitBreaker;
  }

  /**
   * Run an action through fallback, retry and circuit breaker
   *
   * Resolves whenever the action or the fallback action succeeds.
   *
   * @throws FallbackActionError when the fallback action fails
   * @throws ExecutionCancelledError when the signal aborts
   */
  async execute(action: Action<T>, signal?: AbortSignal): Promise<T> {
    return this.wrap(action)(signal ?? new AbortController().signal);
  }

  /**
   * Run an action and capture the outcome instead of throwing
   */
  async executeAndCapture(
    action: Action<T>,
    signal?: AbortSignal
  ): Promise<PolicyResult<T>> {
    try {
      const result = await this.execute(action, signal);
      return { outcome: "successful", result };
    } catch (error) {
      return { outcome: "failure", error, errorKind: classifyError(error) };
    }
  }

  /**
   * Wrap an action in the full pipeline
   */
  wrap(action: Action<T>): Action<T> {
    return this.fallback.wrap(this.retry.wrap(this.circuitBreaker.wrap(action)));
  }
}

/**
 * Build a pipeline from configuration
 *
 * @throws PolicyConfigError when the configuration is invalid
 */
export function createResiliencePipeline<T = void>(
  options: ResiliencePipelineOptions<T>
): ResiliencePipeline<T> {
  const { config, fallbackAction, observers = {}, random } = options;

  const validation = validatePipelineConfig(config);
  if (!validation.valid) {
    throw new PolicyConfigError(validation.errors);
  }

  const circuitBreaker = new CircuitBreakerPolicy({
    failureThreshold: config.failureThreshold,
    samplingDurationMs: config.samplingDurationMs,
    breakDurationMs: config.breakDurationMs,
    minimumThroughput: config.minimumThroughput,
    onBreak: observers.onBreak,
    onReset: observers.onReset,
    onHalfOpen: observers.onHalfOpen,
  });

  const retry = new RetryPolicy({
    maxRetryCount: config.maxRetryCount,
    backoff: createBackoffProvider(
      { baseDelayMs: config.baseDelayMs, jitterMaxMs: config.jitterMaxMs },
      random
    ),
    onRetry: observers.onRetry,
  });

  const fallback = new FallbackPolicy<T>({
    fallbackAction,
    onFallback: observers.onFallback,
  });

  return new ResiliencePipeline(fallback, retry, circuitBreaker);
}
