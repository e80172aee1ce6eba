/**
 * Report Module - Service Layer
 *
 * Streams a window of readings and keeps only the most recent `maxRows`
 * in a ring, so memory stays bounded by the row limit.
 */
import type { Reading } from "../codec/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationStart,
} from "../logger.js";
import type { Report, ReportOptions, ReportSource } from "./schema.js";
import { REPORT_COLUMNS } from "./schema.js";
import { formatReportRow } from "./transform.js";

const log = createLogger("report");

/**
 * Build a report of the readings in `[since, until)`, oldest first.
 * When the window holds more than `maxRows` readings the most recent
 * `maxRows` are kept and the report is marked truncated.
 */
export function buildReport(
  source: ReportSource,
  since: number,
  until: number,
  maxRows: number,
  options: ReportOptions,
): Report {
  const startTime = Date.now();
  logOperationStart(log, "buildReport", { since, until, maxRows });

  const limit = Math.max(0, Math.floor(maxRows));
  const ring: Reading[] = [];
  let total = 0;

  if (until > since) {
    for (const reading of source.rangeScan(since, until)) {
      if (limit > 0) {
        ring[total % limit] = reading;
      }
      total++;
    }
  }

  // Unroll the ring so the oldest kept reading comes first
  const head = total > limit && limit > 0 ? total % limit : 0;
  const kept = [...ring.slice(head), ...ring.slice(0, head)];

  const report: Report = {
    columns: REPORT_COLUMNS,
    rows: kept.map((reading) => formatReportRow(reading, options.sentinel)),
    total,
    truncated: total > kept.length,
    since,
    until,
    generatedAt: options.now ?? Date.now(),
  };

  logOperationComplete(log, "buildReport", startTime, {
    total,
    rows: report.rows.length,
    truncated: report.truncated,
  });

  return report;
}
