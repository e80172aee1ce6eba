/**
 * Store Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { Reading } from "../codec/index.js";
import type { PersistenceError } from "./errors.js";

// =============================================================================
// Records
// =============================================================================

/**
 * A reading as persisted, with its store-assigned sequence id.
 */
export type StoredReading = Reading & Readonly<{ id: number }>;

/**
 * Row shape of the `readings` table.
 */
export type ReadingRow = {
  id: number;
  device_id: string | null;
  temperature: number | null;
  humidity: number | null;
  co2: number | null;
  light: number | null;
  noise: number | null;
  aqi: number | null;
  class_score: number;
  status: string;
  timestamp: number;
  received_at: number;
};

/**
 * Insert parameters (everything but the id).
 */
export type ReadingInsert = Omit<ReadingRow, "id">;

// =============================================================================
// Queries
// =============================================================================

/**
 * History filter. Bounds are epoch ms (`since` inclusive, `until` exclusive);
 * `date` is a `YYYY-MM-DD` UTC calendar day matched against the reading's
 * own timestamp.
 */
export type HistoryFilter = Readonly<{
  since?: number;
  until?: number;
  date?: string;
}>;

/**
 * One page of a newest-first result set.
 */
export type Page<T> = Readonly<{
  items: ReadonlyArray<T>;
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
}>;

// =============================================================================
// Store Contract
// =============================================================================

/**
 * Append-only reading log. The only way other modules reach past readings.
 */
export interface ReadingStore {
  /** Insert a reading; returns its sequence id */
  append(reading: Reading): Result<number, PersistenceError>;
  /** Newest-first page; empty page for out-of-range pages or read failures */
  query(filter: HistoryFilter, page: number, pageSize: number): Page<StoredReading>;
  /** Lazy cursor over `[since, until)` in ascending timestamp order */
  rangeScan(since: number, until: number): Iterable<StoredReading>;
  /** Most recent reading by timestamp */
  latest(): StoredReading | null;
  count(): number;
  close(): void;
}
