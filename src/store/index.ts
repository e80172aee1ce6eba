/**
 * Store Module - Public API
 */

// Types
export type {
  HistoryFilter,
  Page,
  ReadingStore,
  StoredReading,
} from "./schema.js";
export type { PersistenceError } from "./errors.js";

// Error utilities
export { formatPersistenceError } from "./errors.js";

// Service functions
export { createSqliteReadingStore } from "./service.js";
