/**
 * Rolling outcome statistics for the circuit breaker
 *
 * The sampling duration is split into a fixed number of consecutive buckets.
 * A new bucket is started when the current one has aged past its slice, and
 * buckets whose start lies a full sampling duration in the past are dropped.
 * Very short sampling durations use a single bucket covering the whole window.
 *
 * @module resilience/rolling-window
 */

import type { HealthCount } from "@stalwart/types";

/**
 * Number of buckets the sampling duration is divided into
 */
export const NUMBER_OF_WINDOWS = 10;

/**
 * Smallest useful bucket length in milliseconds
 */
export const WINDOW_RESOLUTION_MS = 20;

interface Bucket {
  startedAt: number;
  successes: number;
  failures: number;
}

export class RollingWindowStats {
  private readonly _samplingDurationMs: number;
  private readonly _bucketDurationMs: number;
  private readonly _now: () => number;
  private _buckets: Bucket[] = [];

  constructor(samplingDurationMs: number, now: () => number = () => Date.now()) {
    this._samplingDurationMs = samplingDurationMs;
    this._bucketDurationMs =
      samplingDurationMs < WINDOW_RESOLUTION_MS * NUMBER_OF_WINDOWS
        ? samplingDurationMs
        : samplingDurationMs / NUMBER_OF_WINDOWS;
    this._now = now;
  }

  get bucketDurationMs(): number {
    return this._bucketDurationMs;
  }

  recordSuccess(): void {
    this.currentBucket().successes++;
  }

  recordFailure(): void {
    this.currentBucket().failures++;
  }

  /**
   * Sum of outcomes still inside the sampling window
   */
  getHealthCount(): HealthCount {
    this.prune(this._now());

    let successes = 0;
    let failures = 0;
    for (const bucket of this._buckets) {
      successes += bucket.successes;
      failures += bucket.failures;
    }

    return { successes, failures, total: successes + failures };
  }

  reset(): void {
    this._buckets = [];
  }

  private currentBucket(): Bucket {
    const now = this._now();
    this.prune(now);

    const last = this._buckets[this._buckets.length - 1];
    if (last && now < last.startedAt + this._bucketDurationMs) {
      return last;
    }

    const bucket: Bucket = { startedAt: now, successes: 0, failures: 0 };
    this._buckets.push(bucket);
    return bucket;
  }

  private prune(now: number): void {
    while (
      this._buckets.length > 0 &&
      now - this._buckets[0].startedAt >= this._samplingDurationMs
    ) {
      this._buckets.shift();
    }
  }
}
