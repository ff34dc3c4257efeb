import type { ClassificationStatus } from "../interpreter/types.js";
import type { ResolutionResult } from "../resolver/types.js";

/** One row per canonical test; present even when the subject supplied nothing for it. */
export type ClassifiedRecord = {
  testName: string;
  /** As supplied; "" when the test was not performed. */
  value: string;
  unit: string;
  min?: string;
  max?: string;
  healthyValue?: string;
  status: ClassificationStatus;
  /** Unit reported alongside the value by the extractor, if any. */
  detectedUnit?: string;
};

export type ReportBuckets = {
  abnormal: string[];
  borderline: string[];
  normal: string[];
  notPerformed: string[];
};

export type NameResolution = {
  input: string;
  result: ResolutionResult;
};

export type AggregateResult = {
  /** Keyed by canonical name, in catalog order. Key set always equals the catalog's. */
  records: Map<string, ClassifiedRecord>;
  buckets: ReportBuckets;
  summary: string;
  /** Input names no tier could resolve. */
  unresolved: string[];
  /** Input names that resolved (via alias) to a name the catalog does not contain. */
  orphaned: Array<{ input: string; canonicalName: string }>;
  resolutions: NameResolution[];
};
