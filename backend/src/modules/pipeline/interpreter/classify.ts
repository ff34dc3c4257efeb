/**
 * Single decision table for every reference shape:
 *
 *   value <= hardMin or value >= hardMax   → red
 *   value <= warnLow or value >= warnHigh  → yellow
 *   otherwise                              → green
 *
 * All comparisons are inclusive: a value sitting exactly on a limit gets the worse status.
 */

import { DEFAULT_RANGE_TOLERANCE } from "../../../libs/config.js";
import { assertUnreachable } from "../../../libs/errors.js";
import { DECIMAL_RE, parseReference } from "./parse.js";
import type { Bands, Interpreter, MeasuredStatus, ParsedRange, ReferenceExpression } from "./types.js";

/** Hard limits for one-sided references, as multiples of the limit. */
const BELOW_HARD_MAX_FACTOR = 1.5;
const ABOVE_HARD_MIN_FACTOR = 0.5;
const ABOVE_HARD_MAX_FACTOR = 10;

function pointBand(center: number, tolerance: number): { warnLow: number; warnHigh: number } {
  const a = center * (1 - tolerance);
  const b = center * (1 + tolerance);
  return { warnLow: Math.min(a, b), warnHigh: Math.max(a, b) };
}

export function deriveBands(range: ParsedRange, tolerance: number = DEFAULT_RANGE_TOLERANCE): Bands {
  switch (range.kind) {
    case "interval": {
      const margin = tolerance * (range.high - range.low);
      return {
        hardMin: range.low - margin,
        hardMax: range.high + margin,
        warnLow: range.low + margin,
        warnHigh: range.high - margin,
        center: (range.low + range.high) / 2,
      };
    }
    case "below":
      return {
        hardMin: 0,
        hardMax: BELOW_HARD_MAX_FACTOR * range.limit,
        ...pointBand(range.limit, tolerance),
        center: range.limit,
      };
    case "above":
      return {
        hardMin: ABOVE_HARD_MIN_FACTOR * range.limit,
        hardMax: ABOVE_HARD_MAX_FACTOR * range.limit,
        ...pointBand(range.limit, tolerance),
        center: range.limit,
      };
    case "point":
      return {
        ...(range.hardMin !== undefined ? { hardMin: range.hardMin } : {}),
        ...(range.hardMax !== undefined ? { hardMax: range.hardMax } : {}),
        ...pointBand(range.target, tolerance),
        center: range.target,
      };
    default:
      return assertUnreachable(range);
  }
}

export function classifyAgainstBands(value: number, bands: Bands): "green" | "yellow" | "red" {
  if (bands.hardMin !== undefined && value <= bands.hardMin) return "red";
  if (bands.hardMax !== undefined && value >= bands.hardMax) return "red";
  if (value <= bands.warnLow || value >= bands.warnHigh) return "yellow";
  return "green";
}

/** Subject value → number. Blank, unit-suffixed, prefixed (0x, 0b, 0o) or non-finite strings give null. */
export function parseMeasuredValue(raw: string): number | null {
  const s = raw.trim();
  if (!DECIMAL_RE.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Numeric entry point. Non-finite values and unusable references are uncheckable. */
export function classify(
  value: number,
  reference: ReferenceExpression,
  tolerance: number = DEFAULT_RANGE_TOLERANCE,
): MeasuredStatus {
  if (!Number.isFinite(value)) return "uncheckable";
  const range = parseReference(reference);
  if (range == null) return "uncheckable";
  return classifyAgainstBands(value, deriveBands(range, tolerance));
}

/** String entry point used by the report aggregator; the caller filters out blank values first. */
export function classifyRaw(
  rawValue: string,
  reference: ReferenceExpression,
  tolerance: number = DEFAULT_RANGE_TOLERANCE,
): MeasuredStatus {
  const value = parseMeasuredValue(rawValue);
  if (value == null) return "uncheckable";
  return classify(value, reference, tolerance);
}

export function createInterpreter(options: { tolerance?: number } = {}): Interpreter {
  const tolerance = options.tolerance ?? DEFAULT_RANGE_TOLERANCE;
  return {
    tolerance,
    classify: (rawValue, reference) => classifyRaw(rawValue, reference, tolerance),
  };
}
