/**
 * Store Module - Service Layer
 *
 * Append-only reading log backed by better-sqlite3. WAL mode keeps readers
 * off the writer's back; statements are prepared once per query shape.
 * The database handle never leaves this module.
 */
import Database from "better-sqlite3";
import { type Result, err, ok } from "neverthrow";

import type { Reading } from "../codec/index.js";
import { createLogger } from "../logger.js";
import type { PersistenceError } from "./errors.js";
import { formatPersistenceError, readFailed, writeFailed } from "./errors.js";
import type {
  HistoryFilter,
  Page,
  ReadingInsert,
  ReadingRow,
  ReadingStore,
  StoredReading,
} from "./schema.js";
import {
  buildWhereClause,
  isPageInRange,
  pageOffset,
  readingToInsert,
  rowToReading,
  totalPages,
} from "./transform.js";

const log = createLogger("store");

const SELECT_COLUMNS = `
  id, device_id, temperature, humidity, co2, light, noise, aqi,
  class_score, status, timestamp, received_at
`;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function logReadFailure(error: PersistenceError): void {
  log.error({ error: formatPersistenceError(error) }, "Store read failed");
}

/**
 * Open (or create) the reading log at `dbPath`.
 *
 * @param dbPath - SQLite file path, `:memory:` for an ephemeral store
 */
export function createSqliteReadingStore(dbPath: string = ":memory:"): ReadingStore {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS readings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      device_id TEXT,
      temperature REAL,
      humidity REAL,
      co2 REAL,
      light REAL,
      noise REAL,
      aqi REAL,
      class_score INTEGER NOT NULL DEFAULT 0,
      status TEXT NOT NULL DEFAULT 'Unknown',
      timestamp INTEGER NOT NULL,
      received_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_readings_timestamp ON readings(timestamp);
  `);

  const stmtInsert = db.prepare<ReadingInsert>(`
    INSERT INTO readings (
      device_id, temperature, humidity, co2, light, noise, aqi,
      class_score, status, timestamp, received_at
    ) VALUES (
      @device_id, @temperature, @humidity, @co2, @light, @noise, @aqi,
      @class_score, @status, @timestamp, @received_at
    )
  `);

  const stmtRange = db.prepare<{ since: number; until: number }, ReadingRow>(`
    SELECT ${SELECT_COLUMNS} FROM readings
    WHERE timestamp >= @since AND timestamp < @until
    ORDER BY timestamp ASC, id ASC
  `);

  const stmtLatest = db.prepare<[], ReadingRow>(`
    SELECT ${SELECT_COLUMNS} FROM readings
    ORDER BY timestamp DESC, id DESC
    LIMIT 1
  `);

  const stmtCount = db.prepare<[], { count: number }>(
    "SELECT COUNT(*) AS count FROM readings",
  );

  log.info({ dbPath }, "Reading store opened");

  function queryPage(
    filter: HistoryFilter,
    page: number,
    pageSize: number,
  ): Page<StoredReading> {
    const where = buildWhereClause(filter);

    const countRow = db
      .prepare<Record<string, number>, { count: number }>(
        `SELECT COUNT(*) AS count FROM readings ${where.sql}`,
      )
      .get(where.params);
    const total = countRow?.count ?? 0;
    const pages = totalPages(total, pageSize);

    if (!isPageInRange(page, pageSize, total)) {
      return { items: [], page, pageSize, total, totalPages: pages };
    }

    const rows = db
      .prepare<Record<string, number>, ReadingRow>(
        `SELECT ${SELECT_COLUMNS} FROM readings ${where.sql}
         ORDER BY timestamp DESC, id DESC
         LIMIT @limit OFFSET @offset`,
      )
      .all({ ...where.params, limit: pageSize, offset: pageOffset(page, pageSize) });

    return {
      items: rows.map(rowToReading),
      page,
      pageSize,
      total,
      totalPages: pages,
    };
  }

  function* scan(since: number, until: number): Generator<StoredReading> {
    try {
      for (const row of stmtRange.iterate({ since, until })) {
        yield rowToReading(row);
      }
    } catch (error) {
      logReadFailure(readFailed("rangeScan", "Cursor failed", toError(error)));
    }
  }

  return {
    append(reading: Reading): Result<number, PersistenceError> {
      try {
        const info = stmtInsert.run(readingToInsert(reading));
        return ok(Number(info.lastInsertRowid));
      } catch (error) {
        const cause = toError(error);
        return err(writeFailed(cause.message, cause));
      }
    },

    query(filter, page, pageSize) {
      try {
        return queryPage(filter, page, pageSize);
      } catch (error) {
        logReadFailure(readFailed("query", "History query failed", toError(error)));
        return { items: [], page, pageSize, total: 0, totalPages: 1 };
      }
    },

    rangeScan(since, until) {
      return scan(since, until);
    },

    latest() {
      try {
        const row = stmtLatest.get();
        return row ? rowToReading(row) : null;
      } catch (error) {
        logReadFailure(readFailed("latest", "Latest query failed", toError(error)));
        return null;
      }
    },

    count() {
      try {
        return stmtCount.get()?.count ?? 0;
      } catch (error) {
        logReadFailure(readFailed("count", "Count query failed", toError(error)));
        return 0;
      }
    },

    close() {
      if (db.open) {
        db.close();
        log.info({ dbPath }, "Reading store closed");
      }
    },
  };
}
