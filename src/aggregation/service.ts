/**
 * Aggregation Module - Service Layer
 *
 * Streams readings out of the store and folds them into time buckets.
 * Only the buckets that will be returned are scanned.
 */
import { createLogger } from "../logger.js";
import type { AggregateBucket, ReadingSource } from "./schema.js";
import {
  accumulate,
  bucketIndex,
  createAccumulators,
  finalizeBucket,
  planBuckets,
} from "./transform.js";

const log = createLogger("aggregation");

/**
 * Aggregate `[since, until)` into fixed-width buckets and return the
 * trailing `lastNBuckets` of them, oldest first. Buckets without readings
 * are included with `count: 0` and null means.
 */
export function aggregate(
  source: ReadingSource,
  since: number,
  until: number,
  bucketWidthMs: number,
  lastNBuckets: number,
): AggregateBucket[] {
  const plan = planBuckets(since, until, bucketWidthMs, lastNBuckets);
  if (!plan) {
    log.debug({ since, until, bucketWidthMs, lastNBuckets }, "Empty aggregation range");
    return [];
  }

  const buckets = createAccumulators(plan);
  let scanned = 0;

  for (const reading of source.rangeScan(plan.firstStart, until)) {
    const index = bucketIndex(plan, reading.timestamp);
    const bucket = buckets[index];
    if (bucket) {
      accumulate(bucket, reading);
      scanned++;
    }
  }

  log.debug(
    { since: plan.firstStart, until, buckets: plan.bucketCount, scanned },
    "Aggregated readings",
  );

  return buckets.map(finalizeBucket);
}

/**
 * Dashboard chart series: the last `windowMs` before `now`, split into
 * `bucketCount` equal buckets ending at `now`. A window that does not divide
 * evenly is widened by the remainder at its start.
 */
export function chartSeries(
  source: ReadingSource,
  windowMs: number,
  bucketCount: number,
  now: number = Date.now(),
): AggregateBucket[] {
  const count = Math.max(1, Math.floor(bucketCount));
  const widthMs = Math.max(1, Math.ceil(windowMs / count));
  return aggregate(source, now - widthMs * count, now, widthMs, count);
}
