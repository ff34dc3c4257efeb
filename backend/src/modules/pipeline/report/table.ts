import type { ClassificationStatus } from "../interpreter/types.js";
import type { ClassifiedRecord } from "./types.js";

export type ReportStatusLabel = "NORMAL" | "BORDERLINE" | "ABNORMAL" | "MANUAL CHECK";

export type ReportTableRow = {
  testName: string;
  /** Value followed by the extractor's unit, when one was reported. */
  result: string;
  /** Catalog unit. */
  unit: string;
  referenceRange: string;
  status: ReportStatusLabel;
};

const STATUS_LABELS: Record<Exclude<ClassificationStatus, "empty">, ReportStatusLabel> = {
  green: "NORMAL",
  yellow: "BORDERLINE",
  red: "ABNORMAL",
  uncheckable: "MANUAL CHECK",
};

const COMPARATOR_RE = /^[<>≤≥]/;

/** "min - max", "< max", "> min", the healthy value, or "-". */
export function formatReferenceRange(record: Pick<ClassifiedRecord, "min" | "max" | "healthyValue">): string {
  const min = record.min?.trim() ?? "";
  const max = record.max?.trim() ?? "";
  if (min && max) return `${min} - ${max}`;
  if (max) return COMPARATOR_RE.test(max) ? max : `< ${max}`;
  if (min) return COMPARATOR_RE.test(min) ? min : `> ${min}`;
  return record.healthyValue?.trim() || "-";
}

/** Rows for every performed test, catalog order. Not-performed tests are left out. */
export function buildReportTable(records: Iterable<ClassifiedRecord>): ReportTableRow[] {
  const rows: ReportTableRow[] = [];
  for (const record of records) {
    if (record.status === "empty") continue;
    rows.push({
      testName: record.testName,
      result: [record.value.trim(), record.detectedUnit ?? ""].join(" ").trim(),
      unit: record.unit,
      referenceRange: formatReferenceRange(record),
      status: STATUS_LABELS[record.status],
    });
  }
  return rows;
}

const q = (s: string) => '"' + s.replaceAll('"', '""') + '"';

export function reportTableToCsv(rows: ReportTableRow[]): string {
  const header = ["Test", "Result", "Unit", "ReferenceRange", "Status"];
  const body = rows.map((r) => [q(r.testName), q(r.result), q(r.unit), q(r.referenceRange), q(r.status)].join(","));
  return [header.join(","), ...body].join("\n");
}
