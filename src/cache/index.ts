/**
 * Cache Module - Public API
 */

// Types
export type {
  LatestSnapshot,
  SnapshotChange,
  SnapshotListener,
} from "./schema.js";
export type { LatestStateCache } from "./service.js";

export { INITIAL_SNAPSHOT } from "./schema.js";

// Service functions
export { createLatestStateCache } from "./service.js";
