#!/usr/bin/env node

/**
 * stalwart CLI - Drive a fallback/retry/circuit-breaker pipeline
 */

import { Command } from "commander";
import chalk from "chalk";
import type { CommandContext } from "./cli/context.js";
import { handleRun, type RunOptions } from "./cli/run-command.js";
import { handleConfigShow, handleConfigValidate } from "./cli/config-commands.js";
import { VERSION } from "./version.js";

// Global state
let configPath: string | undefined;
let jsonOutput: boolean = false;

/**
 * Get command context
 */
function getContext(): CommandContext {
  return { cwd: process.cwd(), configPath, jsonOutput };
}

/**
 * Abort controller tripped by SIGINT/SIGTERM so a run can wind down
 */
function createShutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    if (!jsonOutput) {
      console.error(chalk.gray(`\nReceived ${signal}, cancelling in-flight executions...`));
    }
    controller.abort(signal);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  return controller.signal;
}

// Create main program
const program = new Command();

program
  .name("stalwart")
  .description("stalwart - resilience pipeline: fallback, retry and circuit breaker")
  .version(VERSION)
  .option("-c, --config <path>", "Config file (default: ./stalwart.config.json)")
  .option("--json", "Output in JSON format")
  .hook("preAction", (thisCommand: Command) => {
    // Get global options
    const opts = thisCommand.optsWithGlobals();
    if (typeof opts.config === "string") configPath = opts.config;
    if (opts.json === true) jsonOutput = true;
  });

// ============================================================================
// RUN COMMAND
// ============================================================================

program
  .command("run")
  .description("Start one execution per interval through the pipeline and log every transition")
  .option("-i, --interval <duration>", "Delay between executions", "250ms")
  .option("-n, --iterations <n>", "Stop after n executions (default: until interrupted)")
  .option("-f, --failure-rate <ratio>", "Probability that the primary action fails", "0.25")
  .option("--max-retries <n>", "Override maxRetryCount from the config file")
  .option("--break-duration <duration>", "Override breakDurationMs from the config file")
  .action(async (options: RunOptions) => {
    await handleRun(getContext(), options, createShutdownSignal());
  });

// ============================================================================
// CONFIG COMMANDS
// ============================================================================

const config = program.command("config").description("Inspect pipeline configuration");

config
  .command("show")
  .description("Show the effective configuration")
  .action(async () => {
    await handleConfigShow(getContext());
  });

config
  .command("validate <path>")
  .description("Validate a config file")
  .action(async (file: string) => {
    await handleConfigValidate(getContext(), file);
  });

// Parse arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
