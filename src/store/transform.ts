/**
 * Store Module - Pure Transformations
 *
 * Row mapping, date ranges and pagination arithmetic.
 */
import type { Reading } from "../codec/index.js";
import type {
  HistoryFilter,
  ReadingInsert,
  ReadingRow,
  StoredReading,
} from "./schema.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// =============================================================================
// Row Mapping
// =============================================================================

export function readingToInsert(reading: Reading): ReadingInsert {
  return {
    device_id: reading.deviceId,
    temperature: reading.temperature,
    humidity: reading.humidity,
    co2: reading.co2,
    light: reading.light,
    noise: reading.noise,
    aqi: reading.aqi,
    class_score: reading.score,
    status: reading.status,
    timestamp: reading.timestamp,
    received_at: reading.receivedAt,
  };
}

export function rowToReading(row: ReadingRow): StoredReading {
  return {
    id: row.id,
    deviceId: row.device_id,
    temperature: row.temperature,
    humidity: row.humidity,
    co2: row.co2,
    light: row.light,
    noise: row.noise,
    aqi: row.aqi,
    score: row.class_score,
    status: row.status,
    timestamp: row.timestamp,
    receivedAt: row.received_at,
  };
}

// =============================================================================
// Date Filtering
// =============================================================================

/**
 * Resolve a `YYYY-MM-DD` string to its UTC day as `[since, until)` epoch ms.
 *
 * @returns null for strings that are not a real calendar date
 *
 * @example
 * utcDayRange("2024-03-01") // { since: 1709251200000, until: 1709337600000 }
 * utcDayRange("2024-02-30") // null
 */
export function utcDayRange(
  date: string,
): Readonly<{ since: number; until: number }> | null {
  const match = ISO_DATE.exec(date.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const since = Date.UTC(year, month - 1, day);

  // Date.UTC rolls 2024-02-30 over to March; reject anything that moved
  const check = new Date(since);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }

  return { since, until: since + DAY_MS };
}

/**
 * Build the SQL WHERE clause and named parameters for a history filter.
 * An invalid `date` is ignored rather than rejected.
 */
export function buildWhereClause(filter: HistoryFilter): Readonly<{
  sql: string;
  params: Record<string, number>;
}> {
  const conditions: string[] = [];
  const params: Record<string, number> = {};

  if (filter.since !== undefined) {
    conditions.push("timestamp >= @since");
    params.since = filter.since;
  }

  if (filter.until !== undefined) {
    conditions.push("timestamp < @until");
    params.until = filter.until;
  }

  if (filter.date !== undefined) {
    const day = utcDayRange(filter.date);
    if (day) {
      conditions.push("timestamp >= @dayStart AND timestamp < @dayEnd");
      params.dayStart = day.since;
      params.dayEnd = day.until;
    }
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

// =============================================================================
// Pagination
// =============================================================================

/**
 * Number of pages needed for `total` items (at least 1, so page 1 of an
 * empty result is still a valid, empty page).
 */
export function totalPages(total: number, pageSize: number): number {
  if (pageSize < 1) return 1;
  return Math.max(1, Math.ceil(total / pageSize));
}

/**
 * Whether `page` can hold any of `total` items.
 */
export function isPageInRange(page: number, pageSize: number, total: number): boolean {
  return (
    Number.isInteger(page) &&
    Number.isInteger(pageSize) &&
    page >= 1 &&
    pageSize >= 1 &&
    (page - 1) * pageSize < total
  );
}

/**
 * Row offset of the first item on `page` (1-based).
 */
export function pageOffset(page: number, pageSize: number): number {
  return (page - 1) * pageSize;
}
