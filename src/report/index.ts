/**
 * Report Module - Public API
 */

// Types
export type { Report, ReportOptions, ReportRow } from "./schema.js";

export { REPORT_COLUMNS } from "./schema.js";

// Service functions
export { buildReport } from "./service.js";

// Pure transformations
export { formatReportTime, reportToCsv } from "./transform.js";
