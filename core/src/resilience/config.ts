/**
 * Pipeline configuration defaults and validation
 *
 * @module resilience/config
 */

import type { ResiliencePipelineConfig } from "@stalwart/types";

/**
 * Default pipeline configuration
 */
export const DEFAULT_PIPELINE_CONFIG: ResiliencePipelineConfig = {
  maxRetryCount: 3,
  baseDelayMs: 100,
  jitterMaxMs: 300,
  failureThreshold: 0.25,
  samplingDurationMs: 30_000,
  breakDurationMs: 10_000,
  minimumThroughput: 64,
};

/**
 * Result of validating a pipeline configuration
 */
export interface ValidationResult {
  /** Whether the configuration is valid (no errors) */
  valid: boolean;
  /** Configuration problems that must be fixed */
  errors: string[];
  /** Potential issues; the configuration is still usable */
  warnings: string[];
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isNonNegativeFinite(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Validate a pipeline configuration
 *
 * @example
 * ```typescript
 * const result = validatePipelineConfig({ ...DEFAULT_PIPELINE_CONFIG, maxRetryCount: -1 });
 * if (!result.valid) {
 *   console.error("Config errors:", result.errors);
 * }
 * ```
 */
export function validatePipelineConfig(
  config: ResiliencePipelineConfig
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isNonNegativeInteger(config.maxRetryCount)) {
    errors.push("maxRetryCount must be an integer >= 0");
  }
  if (!isNonNegativeFinite(config.baseDelayMs)) {
    errors.push("baseDelayMs must be a finite number >= 0");
  }
  if (!isNonNegativeFinite(config.jitterMaxMs)) {
    errors.push("jitterMaxMs must be a finite number >= 0");
  }
  if (
    !Number.isFinite(config.failureThreshold) ||
    config.failureThreshold <= 0 ||
    config.failureThreshold > 1
  ) {
    errors.push("failureThreshold must be greater than 0 and at most 1");
  }
  if (!Number.isFinite(config.samplingDurationMs) || config.samplingDurationMs <= 0) {
    errors.push("samplingDurationMs must be a finite number > 0");
  }
  if (!isNonNegativeFinite(config.breakDurationMs)) {
    errors.push("breakDurationMs must be a finite number >= 0");
  }
  if (!Number.isInteger(config.minimumThroughput) || config.minimumThroughput < 1) {
    errors.push("minimumThroughput must be an integer >= 1");
  }

  if (config.jitterMaxMs === 0 && config.maxRetryCount > 0) {
    warnings.push("jitterMaxMs is 0: concurrent callers will retry in lockstep");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
