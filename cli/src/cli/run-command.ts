/**
 * CLI handler for the run command
 */

import chalk from "chalk";
import type { ResiliencePipelineConfig } from "@stalwart/types";
import type { RandomSource } from "@stalwart/core";
import { loadConfig, type ConfigLoadResult } from "../config.js";
import { parseDuration } from "../duration.js";
import { createLogger, type LoggerOptions } from "../logger.js";
import { runSimulation, type RunSummary } from "../simulation.js";
import type { CommandContext } from "./context.js";

export const DEFAULT_INTERVAL = "250ms";
export const DEFAULT_FAILURE_RATE = 0.25;

export interface RunOptions {
  interval?: string;
  iterations?: string;
  failureRate?: string;
  maxRetries?: string;
  breakDuration?: string;
  /** Test hooks */
  random?: RandomSource;
  logger?: LoggerOptions;
}

interface ParsedRunOptions {
  intervalMs: number;
  iterations?: number;
  failureRate: number;
  overrides: Partial<ResiliencePipelineConfig>;
}

function parseRunOptions(options: RunOptions): { parsed?: ParsedRunOptions; errors: string[] } {
  const errors: string[] = [];

  let intervalMs = 0;
  try {
    intervalMs = parseDuration(options.interval ?? DEFAULT_INTERVAL);
  } catch (error) {
    errors.push(`--interval: ${error instanceof Error ? error.message : String(error)}`);
  }

  let iterations: number | undefined;
  if (options.iterations !== undefined) {
    iterations = Number(options.iterations);
    if (!Number.isInteger(iterations) || iterations < 1) {
      errors.push("--iterations must be an integer >= 1");
    }
  }

  const failureRate =
    options.failureRate === undefined ? DEFAULT_FAILURE_RATE : Number(options.failureRate);
  if (!Number.isFinite(failureRate) || failureRate < 0 || failureRate > 1) {
    errors.push("--failure-rate must be a number between 0 and 1");
  }

  // Pipeline settings given as flags win over the config file
  const overrides: Partial<ResiliencePipelineConfig> = {};
  if (options.maxRetries !== undefined) {
    overrides.maxRetryCount = Number(options.maxRetries);
  }
  if (options.breakDuration !== undefined) {
    try {
      overrides.breakDurationMs = parseDuration(options.breakDuration);
    } catch (error) {
      errors.push(`--break-duration: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (errors.length > 0) {
    return { errors };
  }
  return { parsed: { intervalMs, iterations, failureRate, overrides }, errors };
}

function printSummary(summary: RunSummary, jsonOutput: boolean): void {
  if (jsonOutput) {
    console.log(JSON.stringify({ event: "summary", ...summary }));
    return;
  }

  console.log();
  console.log(chalk.bold("Run Summary"));
  console.log(`  Executions:        ${summary.executions}`);
  console.log(`  Primary successes: ${chalk.green(summary.primarySuccesses)}`);
  console.log(`  Fallbacks:         ${chalk.yellow(summary.fallbacks)}`);
  console.log(`  Retries:           ${summary.retries}`);
  console.log(`  Breaks:            ${summary.breaks}`);
  if (summary.failures > 0) {
    console.log(`  Failures:          ${chalk.red(summary.failures)}`);
  }
  if (summary.cancelled > 0) {
    console.log(`  Cancelled:         ${chalk.gray(summary.cancelled)}`);
  }
}

/**
 * Handle run command
 *
 * Drives the simulated workload until the iteration count is reached or the
 * signal aborts, then prints a summary.
 */
export async function handleRun(
  ctx: CommandContext,
  options: RunOptions,
  signal?: AbortSignal
): Promise<RunSummary | undefined> {
  const { parsed, errors: optionErrors } = parseRunOptions(options);

  let loaded: ConfigLoadResult;
  try {
    loaded = loadConfig({
      configPath: ctx.configPath,
      cwd: ctx.cwd,
      overrides: parsed?.overrides,
    });
  } catch (error) {
    console.error(chalk.red("Error: Failed to load config"));
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
    return undefined;
  }

  const errors = [...optionErrors, ...loaded.validation.errors];
  if (!parsed || errors.length > 0) {
    console.error(chalk.red("Error: Invalid configuration"));
    for (const error of errors) {
      console.error(chalk.red(`  ✗ ${error}`));
    }
    process.exit(1);
    return undefined;
  }

  const logger = createLogger({ json: ctx.jsonOutput, ...options.logger });
  for (const warning of loaded.validation.warnings) {
    logger.warn(`Warning: ${warning}`, { event: "config_warning" });
  }

  const summary = await runSimulation({
    config: loaded.config,
    intervalMs: parsed.intervalMs,
    iterations: parsed.iterations,
    failureRate: parsed.failureRate,
    logger,
    random: options.random,
    signal,
  });

  printSummary(summary, ctx.jsonOutput);
  return summary;
}
