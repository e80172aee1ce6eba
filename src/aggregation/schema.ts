/**
 * Aggregation Module - Schemas and Types
 */
import type { Channel } from "../codec/index.js";
import type { ReadingStore } from "../store/index.js";

/**
 * Per-channel mean, null when the bucket had no sample for the channel.
 */
export type ChannelMeans = Readonly<Record<Channel, number | null>>;

/**
 * Summary of the readings in `[bucketStart, bucketStart + width)`.
 * Computed on demand, never persisted.
 */
export type AggregateBucket = Readonly<{
  bucketStart: number;
  count: number;
  mean: ChannelMeans;
}>;

/**
 * Anything that can stream readings in timestamp order.
 */
export type ReadingSource = Pick<ReadingStore, "rangeScan">;

/**
 * Resolved bucket layout for a request.
 */
export type BucketPlan = Readonly<{
  /** Start of the first kept bucket */
  firstStart: number;
  widthMs: number;
  bucketCount: number;
}>;
