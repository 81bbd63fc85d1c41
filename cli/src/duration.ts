/**
 * Duration parsing and formatting
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a duration into milliseconds
 *
 * Accepts a number of milliseconds, a string of digits, or a string with a
 * unit suffix: "250ms", "10s", "1.5m", "1h".
 *
 * @throws Error if the value is not a non-negative duration
 */
export function parseDuration(value: number | string): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid duration ${value}. Must be a finite number of milliseconds >= 0`);
    }
    return value;
  }

  const match = value.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h)?$/);
  if (!match) {
    throw new Error(
      `Invalid duration "${value}". Use milliseconds or a value like "250ms", "10s", "1m"`
    );
  }

  const amount = parseFloat(match[1]);
  const unit = match[2] ?? "ms";
  return Math.round(amount * UNIT_MS[unit]);
}

/**
 * Format milliseconds for log output: "250ms", "10s", "1.5s"
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms)) {
    return "indefinitely";
  }
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${Number((ms / 1000).toFixed(3))}s`;
}

/**
 * Format elapsed time as MMm:SSs:mmmms
 */
export function formatElapsed(ms: number): string {
  const minutes = Math.floor(ms / 60_000) % 60;
  const seconds = Math.floor(ms / 1000) % 60;
  const millis = Math.floor(ms) % 1000;

  return `${String(minutes).padStart(2, "0")}m:${String(seconds).padStart(2, "0")}s:${String(millis).padStart(3, "0")}ms`;
}
