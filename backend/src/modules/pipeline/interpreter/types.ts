/**
 * Range interpreter types. One tagged variant per reference-expression shape; every
 * shape is reduced to the same Bands before classification.
 */

export type ClassificationStatus = "green" | "yellow" | "red" | "empty" | "uncheckable";

/** Statuses the interpreter itself can produce; "empty" is decided before it is called. */
export type MeasuredStatus = Exclude<ClassificationStatus, "empty">;

/** The raw catalog strings for one test. */
export type ReferenceExpression = {
  min?: string;
  max?: string;
  healthyValue?: string;
};

export type ParsedRange =
  | { kind: "interval"; low: number; high: number }
  | { kind: "below"; limit: number }
  | { kind: "above"; limit: number }
  | { kind: "point"; target: number; hardMin?: number; hardMax?: number };

export type Bands = {
  /** Red at or below. Absent when the expression gives no lower hard limit. */
  hardMin?: number;
  /** Red at or above. */
  hardMax?: number;
  /** Yellow at or below (when not red). */
  warnLow: number;
  /** Yellow at or above (when not red). */
  warnHigh: number;
  center: number;
};

export interface Interpreter {
  readonly tolerance: number;
  /** Classify a raw, non-blank value string. Never throws. */
  classify(rawValue: string, reference: ReferenceExpression): MeasuredStatus;
}
