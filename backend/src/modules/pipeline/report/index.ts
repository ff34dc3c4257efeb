export { aggregate, isBlank } from "./aggregate.js";
export type { AggregateOptions } from "./aggregate.js";
export { buildSummary, BUCKET_LABELS, NO_DATA_SUMMARY } from "./summary.js";
export { buildReportTable, formatReferenceRange, reportTableToCsv } from "./table.js";
export type { ReportStatusLabel, ReportTableRow } from "./table.js";
export { toWireRecord, toWireRecords } from "./serialize.js";
export type { WireRecord } from "./serialize.js";
export type { AggregateResult, ClassifiedRecord, NameResolution, ReportBuckets } from "./types.js";
