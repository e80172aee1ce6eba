/**
 * Aggregation Module - Pure Transformations
 *
 * Bucket layout and running means. No I/O.
 */
import type { Channel, Reading } from "../codec/index.js";
import { CHANNELS } from "../codec/index.js";
import type { AggregateBucket, BucketPlan, ChannelMeans } from "./schema.js";

// =============================================================================
// Bucket Layout
// =============================================================================

/**
 * Lay out fixed-width buckets `[since + k·w, since + (k+1)·w)` over
 * `[since, until)` and keep only the trailing `lastNBuckets`.
 *
 * @returns null when the range or arguments produce no bucket
 *
 * @example
 * planBuckets(0, 100, 10, 3) // { firstStart: 70, widthMs: 10, bucketCount: 3 }
 */
export function planBuckets(
  since: number,
  until: number,
  bucketWidthMs: number,
  lastNBuckets: number,
): BucketPlan | null {
  if (
    !Number.isFinite(since) ||
    !Number.isFinite(until) ||
    until <= since ||
    !(bucketWidthMs >= 1) ||
    !(lastNBuckets >= 1)
  ) {
    return null;
  }

  const widthMs = Math.floor(bucketWidthMs);
  const total = Math.ceil((until - since) / widthMs);
  const bucketCount = Math.min(total, Math.floor(lastNBuckets));

  return {
    firstStart: since + (total - bucketCount) * widthMs,
    widthMs,
    bucketCount,
  };
}

/**
 * Index of the bucket holding `timestamp`, or -1 when it falls outside the plan.
 */
export function bucketIndex(plan: BucketPlan, timestamp: number): number {
  const offset = timestamp - plan.firstStart;
  if (offset < 0) return -1;

  const index = Math.floor(offset / plan.widthMs);
  return index < plan.bucketCount ? index : -1;
}

// =============================================================================
// Accumulation
// =============================================================================

type ChannelSums = Record<Channel, { sum: number; samples: number }>;

/**
 * Mutable running totals for one bucket.
 */
export type BucketAccumulator = {
  readonly bucketStart: number;
  count: number;
  readonly sums: ChannelSums;
};

function emptySums(): ChannelSums {
  return {
    temperature: { sum: 0, samples: 0 },
    humidity: { sum: 0, samples: 0 },
    co2: { sum: 0, samples: 0 },
    light: { sum: 0, samples: 0 },
    noise: { sum: 0, samples: 0 },
    aqi: { sum: 0, samples: 0 },
  };
}

export function createAccumulators(plan: BucketPlan): BucketAccumulator[] {
  return Array.from({ length: plan.bucketCount }, (_, k) => ({
    bucketStart: plan.firstStart + k * plan.widthMs,
    count: 0,
    sums: emptySums(),
  }));
}

/**
 * Add one reading to a bucket. Absent channels do not count as samples.
 */
export function accumulate(acc: BucketAccumulator, reading: Reading): void {
  acc.count++;
  for (const channel of CHANNELS) {
    const value = reading[channel];
    if (value !== null) {
      acc.sums[channel].sum += value;
      acc.sums[channel].samples++;
    }
  }
}

export function finalizeBucket(acc: BucketAccumulator): AggregateBucket {
  const mean: ChannelMeans = {
    temperature: meanOf(acc.sums.temperature),
    humidity: meanOf(acc.sums.humidity),
    co2: meanOf(acc.sums.co2),
    light: meanOf(acc.sums.light),
    noise: meanOf(acc.sums.noise),
    aqi: meanOf(acc.sums.aqi),
  };

  return { bucketStart: acc.bucketStart, count: acc.count, mean };
}

function meanOf(total: { sum: number; samples: number }): number | null {
  return total.samples === 0 ? null : total.sum / total.samples;
}
