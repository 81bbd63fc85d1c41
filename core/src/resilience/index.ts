/**
 * Resilience Layer Exports
 *
 * @module resilience
 */

// Configuration
export {
  DEFAULT_PIPELINE_CONFIG,
  validatePipelineConfig,
  type ValidationResult,
} from "./config.js";

// Errors
export {
  ResilienceError,
  BrokenCircuitError,
  IsolatedCircuitError,
  RetryExhaustedError,
  FallbackActionError,
  ExecutionCancelledError,
  PolicyConfigError,
  classifyError,
  describeError,
} from "./errors.js";

// Backoff
export {
  calculateBackoff,
  createBackoffProvider,
  type BackoffConfig,
  type BackoffProvider,
  type RandomSource,
} from "./backoff.js";

// Retry
export {
  RetryPolicy,
  isRetryableError,
  sleep,
  MAX_TIMER_DELAY_MS,
  type RetryPolicyOptions,
} from "./retry.js";

// Circuit breaker
export {
  CircuitBreakerPolicy,
  type CircuitBreakerOptions,
} from "./circuit-breaker.js";
export { RollingWindowStats } from "./rolling-window.js";

// Fallback
export {
  FallbackPolicy,
  type FallbackAction,
  type FallbackPolicyOptions,
} from "./fallback.js";

// Pipeline
export {
  ResiliencePipeline,
  createResiliencePipeline,
  type ResiliencePipelineOptions,
} from "./pipeline.js";
