/**
 * Aggregation Module - Public API
 */

// Types
export type { AggregateBucket, ChannelMeans, ReadingSource } from "./schema.js";

// Service functions
export { aggregate, chartSeries } from "./service.js";
