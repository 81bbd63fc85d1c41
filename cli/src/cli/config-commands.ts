/**
 * CLI handlers for config commands
 */

import chalk from "chalk";
import { loadConfig, type ConfigLoadResult } from "../config.js";
import { formatDuration } from "../duration.js";
import type { CommandContext } from "./context.js";

const DURATION_FIELDS: ReadonlySet<string> = new Set([
  "baseDelayMs",
  "jitterMaxMs",
  "samplingDurationMs",
  "breakDurationMs",
]);

function tryLoad(ctx: CommandContext, configPath?: string): ConfigLoadResult | null {
  try {
    return loadConfig({ configPath, cwd: ctx.cwd });
  } catch (error) {
    console.error(chalk.red("Error: Failed to load config"));
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
    return null;
  }
}

function printIssues(result: ConfigLoadResult): void {
  for (const error of result.validation.errors) {
    console.log(chalk.red(`  ✗ ${error}`));
  }
  for (const warning of result.validation.warnings) {
    console.log(chalk.yellow(`  ⚠ ${warning}`));
  }
}

/**
 * Handle config show command
 */
export async function handleConfigShow(ctx: CommandContext): Promise<void> {
  const result = tryLoad(ctx, ctx.configPath);
  if (!result) {
    return;
  }

  if (ctx.jsonOutput) {
    console.log(
      JSON.stringify(
        {
          source: result.source ?? null,
          config: result.config,
          errors: result.validation.errors,
          warnings: result.validation.warnings,
        },
        null,
        2
      )
    );
    return;
  }

  console.log(
    chalk.bold("Pipeline Config") + chalk.gray(` (${result.source ?? "defaults"})`)
  );
  for (const [key, value] of Object.entries(result.config)) {
    const shown = DURATION_FIELDS.has(key) ? formatDuration(value) : String(value);
    console.log(`  ${chalk.cyan(key)}: ${shown}`);
  }

  if (result.validation.errors.length > 0 || result.validation.warnings.length > 0) {
    console.log();
    printIssues(result);
  }
}

/**
 * Handle config validate command
 */
export async function handleConfigValidate(
  ctx: CommandContext,
  configPath: string
): Promise<void> {
  const result = tryLoad(ctx, configPath);
  if (!result) {
    return;
  }

  const { valid, errors, warnings } = result.validation;

  if (ctx.jsonOutput) {
    console.log(JSON.stringify({ source: result.source, valid, errors, warnings }, null, 2));
  } else if (valid) {
    console.log(chalk.green(`✓ ${result.source} is valid`));
    printIssues(result);
  } else {
    console.log(chalk.red(`✗ ${result.source} is invalid`));
    printIssues(result);
  }

  if (!valid) {
    process.exit(1);
  }
}
