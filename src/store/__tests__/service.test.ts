/**
 * Store Service Tests
 *
 * Runs against an in-memory better-sqlite3 database.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type { Reading } from "../../codec/index.js";
import { EMPTY_READING } from "../../codec/index.js";
import type { ReadingStore, StoredReading } from "../schema.js";
import { createSqliteReadingStore } from "../service.js";

const T0 = Date.UTC(2024, 2, 1, 8, 0, 0);
const MINUTE = 60_000;

function makeReading(minute: number, overrides: Partial<Reading> = {}): Reading {
  return {
    ...EMPTY_READING,
    temperature: 20 + minute / 10,
    timestamp: T0 + minute * MINUTE,
    receivedAt: T0 + minute * MINUTE + 100,
    ...overrides,
  };
}

describe("SQLite Reading Store", () => {
  let store: ReadingStore;

  beforeEach(() => {
    store = createSqliteReadingStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  // ===========================================================================
  // append
  // ===========================================================================

  describe("append", () => {
    test("assigns increasing sequence ids", () => {
      const first = store.append(makeReading(0))._unsafeUnwrap();
      const second = store.append(makeReading(1))._unsafeUnwrap();

      expect(second).toBeGreaterThan(first);
      expect(store.count()).toBe(2);
    });

    test("persists absent channels as absent", () => {
      store.append(makeReading(0, { temperature: null, co2: 900 }));

      const stored = store.latest();

      expect(stored?.temperature).toBeNull();
      expect(stored?.co2).toBe(900);
      expect(stored?.humidity).toBeNull();
    });

    test("returns WRITE_FAILED once the database is closed", () => {
      store.close();

      const result = store.append(makeReading(0));

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().type).toBe("WRITE_FAILED");
    });
  });

  // ===========================================================================
  // query
  // ===========================================================================

  describe("query", () => {
    test("returns newest first by reading timestamp", () => {
      // Arrival order differs from timestamp order
      store.append(makeReading(5));
      store.append(makeReading(1));
      store.append(makeReading(3));

      const page = store.query({}, 1, 10);

      expect(page.items.map((r) => r.timestamp)).toEqual([
        T0 + 5 * MINUTE,
        T0 + 3 * MINUTE,
        T0 + 1 * MINUTE,
      ]);
      expect(page.total).toBe(3);
      expect(page.totalPages).toBe(1);
    });

    test("filters by UTC calendar date of the reading timestamp", () => {
      store.append(makeReading(0, { timestamp: Date.UTC(2024, 1, 29, 23, 59) }));
      store.append(makeReading(0, { timestamp: Date.UTC(2024, 2, 1, 0, 0) }));
      store.append(makeReading(0, { timestamp: Date.UTC(2024, 2, 1, 23, 59) }));
      store.append(makeReading(0, { timestamp: Date.UTC(2024, 2, 2, 0, 0) }));

      const page = store.query({ date: "2024-03-01" }, 1, 10);

      expect(page.total).toBe(2);
      expect(page.items.map((r) => r.timestamp)).toEqual([
        Date.UTC(2024, 2, 1, 23, 59),
        Date.UTC(2024, 2, 1, 0, 0),
      ]);
    });

    test("ignores an invalid date filter", () => {
      store.append(makeReading(0));
      store.append(makeReading(1));

      expect(store.query({ date: "2024-02-30" }, 1, 10).total).toBe(2);
    });

    test("applies since/until bounds", () => {
      for (let minute = 0; minute < 10; minute++) {
        store.append(makeReading(minute));
      }

      const page = store.query(
        { since: T0 + 2 * MINUTE, until: T0 + 5 * MINUTE },
        1,
        10,
      );

      expect(page.items.map((r) => r.timestamp)).toEqual([
        T0 + 4 * MINUTE,
        T0 + 3 * MINUTE,
        T0 + 2 * MINUTE,
      ]);
    });

    test("returns an empty page for out-of-range pages", () => {
      store.append(makeReading(0));

      const beyond = store.query({}, 5, 10);
      const zero = store.query({}, 0, 10);

      expect(beyond.items).toEqual([]);
      expect(beyond.total).toBe(1);
      expect(zero.items).toEqual([]);
    });

    test("returns an empty first page for an empty store", () => {
      const page = store.query({}, 1, 50);

      expect(page).toEqual({
        items: [],
        page: 1,
        pageSize: 50,
        total: 0,
        totalPages: 1,
      });
    });

    test("pages are exhaustive and free of duplicates", () => {
      // Several readings share a timestamp to exercise the id tie-break
      for (let i = 0; i < 23; i++) {
        store.append(makeReading(Math.floor(i / 3)));
      }

      const first = store.query({}, 1, 5);
      const collected: StoredReading[] = [];
      for (let page = 1; page <= first.totalPages; page++) {
        collected.push(...store.query({}, page, 5).items);
      }
      const all = store.query({}, 1, 100).items;

      expect(first.totalPages).toBe(5);
      expect(collected).toHaveLength(23);
      expect(new Set(collected.map((r) => r.id)).size).toBe(23);
      expect(collected).toEqual(all);
    });

    test("returns an empty page once the database is closed", () => {
      store.append(makeReading(0));
      store.close();

      expect(store.query({}, 1, 10).items).toEqual([]);
    });
  });

  // ===========================================================================
  // rangeScan
  // ===========================================================================

  describe("rangeScan", () => {
    test("yields readings in [since, until) by ascending timestamp", () => {
      store.append(makeReading(3));
      store.append(makeReading(0));
      store.append(makeReading(5));
      store.append(makeReading(2));

      const scanned = [...store.rangeScan(T0, T0 + 5 * MINUTE)];

      expect(scanned.map((r) => r.timestamp)).toEqual([
        T0,
        T0 + 2 * MINUTE,
        T0 + 3 * MINUTE,
      ]);
    });

    test("is lazy and can be abandoned early", () => {
      for (let minute = 0; minute < 100; minute++) {
        store.append(makeReading(minute));
      }

      const iterator = store.rangeScan(T0, T0 + 100 * MINUTE)[Symbol.iterator]();
      const first = iterator.next();
      iterator.return?.();

      expect(first.done).toBe(false);
      // The connection is usable again after the cursor is released
      expect(store.append(makeReading(200)).isOk()).toBe(true);
    });

    test("yields nothing for an empty range", () => {
      store.append(makeReading(0));

      expect([...store.rangeScan(T0 + MINUTE, T0 + 2 * MINUTE)]).toEqual([]);
    });
  });

  // ===========================================================================
  // latest
  // ===========================================================================

  describe("latest", () => {
    test("returns null for an empty store", () => {
      expect(store.latest()).toBeNull();
    });

    test("returns the reading with the newest timestamp", () => {
      store.append(makeReading(9, { status: "Good" }));
      store.append(makeReading(4, { status: "Poor" }));

      expect(store.latest()?.status).toBe("Good");
    });
  });
});
