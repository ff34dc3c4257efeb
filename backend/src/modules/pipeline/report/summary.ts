import type { ReportBuckets } from "./types.js";

export const BUCKET_LABELS = {
  abnormal: "Abnormal",
  borderline: "Borderline",
  normal: "Normal",
  notPerformed: "Not performed",
} as const satisfies Record<keyof ReportBuckets, string>;

const BUCKET_ORDER: ReadonlyArray<keyof ReportBuckets> = ["abnormal", "borderline", "normal", "notPerformed"];

export const NO_DATA_SUMMARY = "No test results available.";

/** One line per non-empty bucket ("Abnormal: A, B"), or the fixed no-data line. */
export function buildSummary(buckets: ReportBuckets): string {
  const lines = BUCKET_ORDER.filter((key) => buckets[key].length > 0).map(
    (key) => `${BUCKET_LABELS[key]}: ${buckets[key].join(", ")}`,
  );
  return lines.length > 0 ? lines.join("\n") : NO_DATA_SUMMARY;
}
