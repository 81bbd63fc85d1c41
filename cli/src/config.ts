/**
 * Pipeline configuration loading
 *
 * Defaults are overlaid with an optional JSON config file, then with
 * command-line overrides. Durations in the file may be written as numbers of
 * milliseconds or as strings such as "250ms" or "10s".
 */

import * as fs from "fs";
import * as path from "path";
import type { ResiliencePipelineConfig } from "@stalwart/types";
import {
  DEFAULT_PIPELINE_CONFIG,
  validatePipelineConfig,
  type ValidationResult,
} from "@stalwart/core";
import { parseDuration } from "./duration.js";

/**
 * Config file looked up in the working directory when none is given
 */
export const CONFIG_FILE = "stalwart.config.json";

type ConfigKey = keyof ResiliencePipelineConfig;

const DURATION_KEYS: readonly ConfigKey[] = [
  "baseDelayMs",
  "jitterMaxMs",
  "samplingDurationMs",
  "breakDurationMs",
];

const NUMERIC_KEYS: readonly ConfigKey[] = [
  "maxRetryCount",
  "failureThreshold",
  "minimumThroughput",
];

function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(DEFAULT_PIPELINE_CONFIG, key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  /** Directory searched for CONFIG_FILE when no path is given */
  cwd?: string;
  /** Values that take precedence over the file */
  overrides?: Partial<ResiliencePipelineConfig>;
}

/**
 * Result of loading configuration with validation info
 */
export interface ConfigLoadResult {
  /** The effective configuration */
  config: ResiliencePipelineConfig;
  /** Problems found in the file and in the merged configuration */
  validation: ValidationResult;
  /** File the configuration was read from, if any */
  source?: string;
}

/**
 * Resolve which config file to read, if any
 */
export function resolveConfigPath(options: LoadConfigOptions): string | undefined {
  if (options.configPath) {
    return path.resolve(options.cwd ?? process.cwd(), options.configPath);
  }

  const candidate = path.join(options.cwd ?? process.cwd(), CONFIG_FILE);
  return fs.existsSync(candidate) ? candidate : undefined;
}

/**
 * Convert the parsed contents of a config file into configuration values
 */
export function parseConfigFile(
  raw: unknown,
  errors: string[],
  warnings: string[]
): Partial<ResiliencePipelineConfig> {
  const parsed: Partial<ResiliencePipelineConfig> = {};

  if (!isRecord(raw)) {
    errors.push("Config file must contain a JSON object");
    return parsed;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      warnings.push(`Unknown config key '${key}' ignored`);
      continue;
    }

    if (DURATION_KEYS.includes(key)) {
      if (typeof value !== "number" && typeof value !== "string") {
        errors.push(`${key} must be a number of milliseconds or a duration string`);
        continue;
      }
      try {
        parsed[key] = parseDuration(value);
      } catch (error) {
        errors.push(`${key}: ${error instanceof Error ? error.message : String(error)}`);
      }
      continue;
    }

    if (NUMERIC_KEYS.includes(key)) {
      if (typeof value !== "number") {
        errors.push(`${key} must be a number`);
        continue;
      }
      parsed[key] = value;
    }
  }

  return parsed;
}

/**
 * Load the effective pipeline configuration
 *
 * @throws Error if the config file cannot be read or is not valid JSON
 */
export function loadConfig(options: LoadConfigOptions = {}): ConfigLoadResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const source = resolveConfigPath(options);

  let fromFile: Partial<ResiliencePipelineConfig> = {};
  if (source) {
    if (!fs.existsSync(source)) {
      throw new Error(`Config file not found: ${source}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(source, "utf8"));
    } catch (error) {
      throw new Error(
        `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    fromFile = parseConfigFile(raw, errors, warnings);
  }

  const config: ResiliencePipelineConfig = {
    ...DEFAULT_PIPELINE_CONFIG,
    ...fromFile,
    ...options.overrides,
  };

  if (errors.length === 0) {
    const validation = validatePipelineConfig(config);
    errors.push(...validation.errors);
    warnings.push(...validation.warnings);
  }

  return {
    config,
    validation: { valid: errors.length === 0, errors, warnings },
    source,
  };
}
