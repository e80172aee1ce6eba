/**
 * Report Module - Schemas and Types
 */
import type { ReadingStore } from "../store/index.js";

/**
 * Column headers, in row order.
 */
export const REPORT_COLUMNS = [
  "Time",
  "Temp (°C)",
  "Humidity (%)",
  "CO2 (ppm)",
  "Light (lux)",
  "Noise (dB)",
  "AQI",
  "Score",
] as const;

export type ReportRow = ReadonlyArray<string>;

/**
 * Tabular report handed to the rendering collaborator.
 */
export type Report = Readonly<{
  columns: ReadonlyArray<string>;
  /** Oldest first */
  rows: ReadonlyArray<ReportRow>;
  /** Readings in the window, before truncation */
  total: number;
  truncated: boolean;
  since: number;
  until: number;
  generatedAt: number;
}>;

export type ReportOptions = Readonly<{
  /** Text shown for a channel that did not report */
  sentinel: string;
  now?: number;
}>;

export type ReportSource = Pick<ReadingStore, "rangeScan">;
