/**
 * Simulated workload driven through a resilience pipeline
 *
 * Starts one execution every interval without waiting for earlier ones, so
 * executions overlap and share the pipeline's circuit breaker. The primary
 * action fails at random; every policy transition is logged.
 */

import type { PipelineObservers, ResiliencePipelineConfig } from "@stalwart/types";
import {
  createResiliencePipeline,
  ExecutionCancelledError,
  sleep,
  type RandomSource,
} from "@stalwart/core";
import { formatDuration } from "./duration.js";
import type { Logger } from "./logger.js";

/**
 * Which path produced the result of an execution
 */
export type ExecutionOutcome = "primary" | "fallback";

/**
 * Thrown by the simulated primary action
 */
export class SimulatedActionError extends Error {
  constructor() {
    super("Ope");
    this.name = "SimulatedActionError";
  }
}

/**
 * Counters reported when the run ends
 */
export interface RunSummary {
  executions: number;
  primarySuccesses: number;
  fallbacks: number;
  retries: number;
  breaks: number;
  /** Executions whose fallback action failed as well */
  failures: number;
  /** Executions abandoned on shutdown */
  cancelled: number;
}

export interface SimulationOptions {
  config: ResiliencePipelineConfig;
  /** Delay between execution starts */
  intervalMs: number;
  /** Stop after this many executions (default: run until aborted) */
  iterations?: number;
  /** Probability (0-1) that a primary attempt throws */
  failureRate: number;
  logger: Logger;
  random?: RandomSource;
  /** Stops the loop and cancels in-flight executions */
  signal?: AbortSignal;
}

export function createSummary(): RunSummary {
  return {
    executions: 0,
    primarySuccesses: 0,
    fallbacks: 0,
    retries: 0,
    breaks: 0,
    failures: 0,
    cancelled: 0,
  };
}

export function createPrimaryAction(options: {
  failureRate: number;
  random: RandomSource;
  logger: Logger;
}): () => ExecutionOutcome {
  return () => {
    if (options.random() < options.failureRate) {
      throw new SimulatedActionError();
    }
    options.logger.info("! Primary Action", { event: "primary" });
    return "primary";
  };
}

export function createFallbackAction(logger: Logger): () => ExecutionOutcome {
  return () => {
    logger.info("! Fallback Action", { event: "fallback" });
    return "fallback";
  };
}

/**
 * Observers that log each transition and count it in the summary
 */
export function createLoggingObservers(
  logger: Logger,
  summary: RunSummary
): PipelineObservers {
  return {
    onRetry: (_error, waitMs, attempt) => {
      summary.retries++;
      logger.info(`Retrying... (attempt ${attempt}, waiting ${formatDuration(waitMs)})`, {
        event: "retry",
        attempt,
        waitMs,
      });
    },
    onBreak: (_error, breakDurationMs) => {
      summary.breaks++;
      logger.warn(`Circuit breaker break: waiting ${formatDuration(breakDurationMs)}...`, {
        event: "break",
        breakDurationMs: Number.isFinite(breakDurationMs) ? breakDurationMs : undefined,
      });
    },
    onReset: () => {
      logger.info("Circuit breaker has reset!", { event: "reset" });
    },
    onHalfOpen: () => {
      logger.info("Circuit breaker half-open", { event: "half_open" });
    },
    onFallback: (error, kind) => {
      const name = error instanceof Error ? error.name : typeof error;
      logger.warn(`Fallback engaged: ${name} (${kind})`, {
        event: "fallback_engaged",
        kind,
        error: name,
      });
    },
  };
}

/**
 * Run the simulated workload until the iteration count is reached or the
 * signal aborts, then wait for every execution still in flight
 */
export async function runSimulation(options: SimulationOptions): Promise<RunSummary> {
  const { config, intervalMs, iterations, failureRate, logger } = options;
  const random = options.random ?? Math.random;
  const signal = options.signal ?? new AbortController().signal;
  const summary = createSummary();

  const pipeline = createResiliencePipeline<ExecutionOutcome>({
    config,
    fallbackAction: createFallbackAction(logger),
    observers: createLoggingObservers(logger, summary),
    random,
  });
  const primaryAction = createPrimaryAction({ failureRate, random, logger });

  const executions = new AbortController();
  const cancelExecutions = () => executions.abort();
  signal.addEventListener("abort", cancelExecutions, { once: true });

  const inFlight = new Set<Promise<void>>();
  const start = () => {
    summary.executions++;
    const execution = pipeline
      .execute(primaryAction, executions.signal)
      .then((outcome) => {
        if (outcome === "primary") {
          summary.primarySuccesses++;
        } else {
          summary.fallbacks++;
        }
      })
      .catch((error: unknown) => {
        if (error instanceof ExecutionCancelledError) {
          summary.cancelled++;
          return;
        }
        summary.failures++;
        logger.error(`Execution failed: ${error instanceof Error ? error.message : String(error)}`, {
          event: "failure",
        });
      })
      .finally(() => {
        inFlight.delete(execution);
      });
    inFlight.add(execution);
  };

  try {
    for (let i = 0; iterations === undefined || i < iterations; i++) {
      if (i > 0) {
        try {
          await sleep(intervalMs, signal);
        } catch (error) {
          if (error instanceof ExecutionCancelledError) {
            break;
          }
          throw error;
        }
      }
      if (signal.aborted) {
        break;
      }
      start();
    }

    await Promise.all([...inFlight]);
  } finally {
    signal.removeEventListener("abort", cancelExecutions);
  }

  return summary;
}
