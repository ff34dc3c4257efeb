/**
 * Reference-expression grammar: plain number, interval ("70-110", en/em dash), inequality
 * ("<35", "<=35", "≥4.7"). Parsing happens once per classification; callers only see ParsedRange.
 */

import type { ParsedRange, ReferenceExpression } from "./types.js";

const NUM = String.raw`[-+]?(?:\d+(?:\.\d*)?|\.\d+)`;
const PLAIN_RE = new RegExp(`^(${NUM})$`);
const INTERVAL_RE = new RegExp(String.raw`^(${NUM})\s*[-–—]\s*(${NUM})$`);
const INEQUALITY_RE = new RegExp(String.raw`^(<=|>=|≤|≥|<|>)\s*(${NUM})$`);
/** Decimal literal with optional exponent. No hex, binary or octal prefixes. */
export const DECIMAL_RE = new RegExp(String.raw`^${NUM}(?:[eE][-+]?\d+)?$`);

function toFinite(s: string | undefined): number | null {
  if (s === undefined) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function parsePlainNumber(raw: string | undefined): number | null {
  if (raw == null) return null;
  const m = PLAIN_RE.exec(raw.trim());
  return m ? toFinite(m[1]) : null;
}

/** "low-high" with low < high; anything else is not an interval. */
export function parseInterval(raw: string | undefined): { low: number; high: number } | null {
  if (raw == null) return null;
  const m = INTERVAL_RE.exec(raw.trim());
  if (!m) return null;
  const low = toFinite(m[1]);
  const high = toFinite(m[2]);
  if (low == null || high == null || !(low < high)) return null;
  return { low, high };
}

/** "<X" / ">X" (also <=, >=, ≤, ≥). The limit must be positive for the band math to hold. */
export function parseInequality(raw: string | undefined): ParsedRange | null {
  if (raw == null) return null;
  const m = INEQUALITY_RE.exec(raw.trim());
  if (!m) return null;
  const limit = toFinite(m[2]);
  if (limit == null || limit <= 0) return null;
  const op = m[1];
  const below = op === "<" || op === "<=" || op === "≤";
  return below ? { kind: "below", limit } : { kind: "above", limit };
}

/**
 * Resolution order:
 * 1. numeric min and max (min < max) → interval
 * 2. an interval written in healthy value / min / max → interval
 * 3. an inequality in healthy value / min / max → below / above
 * 4. numeric healthy value → point, numeric min / max as hard limits
 * 5. numeric min only → above min; numeric max only → below max
 * Otherwise null (no usable reference).
 */
export function parseReference(ref: ReferenceExpression): ParsedRange | null {
  const min = parsePlainNumber(ref.min);
  const max = parsePlainNumber(ref.max);
  if (min != null && max != null && min < max) {
    return { kind: "interval", low: min, high: max };
  }

  const fields = [ref.healthyValue, ref.min, ref.max];

  for (const field of fields) {
    const interval = parseInterval(field);
    if (interval) return { kind: "interval", ...interval };
  }

  for (const field of fields) {
    const inequality = parseInequality(field);
    if (inequality) return inequality;
  }

  const target = parsePlainNumber(ref.healthyValue);
  if (target != null) {
    return {
      kind: "point",
      target,
      ...(min != null ? { hardMin: min } : {}),
      ...(max != null ? { hardMax: max } : {}),
    };
  }

  if (min != null && max == null && min > 0) return { kind: "above", limit: min };
  if (max != null && min == null && max > 0) return { kind: "below", limit: max };

  return null;
}
