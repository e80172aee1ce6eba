/**
 * Report Module - Pure Transformations
 */
import type { Reading } from "../codec/index.js";
import type { Report, ReportRow } from "./schema.js";

/**
 * `YYYY-MM-DD HH:MM` in UTC.
 *
 * @example
 * formatReportTime(Date.UTC(2024, 2, 1, 9, 5)) // "2024-03-01 09:05"
 */
export function formatReportTime(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 16).replace("T", " ");
}

function fixed(value: number | null, digits: number, sentinel: string): string {
  return value === null ? sentinel : value.toFixed(digits);
}

/**
 * Render one reading as a report row.
 * Temperature, humidity and noise get one decimal; CO2, light and AQI none.
 */
export function formatReportRow(reading: Reading, sentinel: string): ReportRow {
  return [
    formatReportTime(reading.timestamp),
    fixed(reading.temperature, 1, sentinel),
    fixed(reading.humidity, 1, sentinel),
    fixed(reading.co2, 0, sentinel),
    fixed(reading.light, 0, sentinel),
    fixed(reading.noise, 1, sentinel),
    fixed(reading.aqi, 0, sentinel),
    String(Math.trunc(reading.score)),
  ];
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

/**
 * CSV export: header line plus one line per row, CRLF separated.
 */
export function reportToCsv(report: Report): string {
  const lines = [report.columns, ...report.rows].map((fields) =>
    fields.map(csvField).join(","),
  );
  return `${lines.join("\r\n")}\r\n`;
}
