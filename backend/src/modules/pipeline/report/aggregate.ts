/**
 * Report aggregation: resolve every input name, classify every catalog test, bucket the results.
 * Deterministic and synchronous; unresolved and orphaned inputs are returned, not thrown.
 */

import { assertUnreachable } from "../../../libs/errors.js";
import { silentLog, type PipelineLog } from "../../../libs/log.js";
import type { Catalog } from "../../catalog/types.js";
import type { Interpreter, MeasuredStatus } from "../interpreter/types.js";
import type { Resolver } from "../resolver/types.js";
import { buildSummary } from "./summary.js";
import type { AggregateResult, ClassifiedRecord, NameResolution, ReportBuckets } from "./types.js";

export type AggregateOptions = {
  /** Units reported next to each raw value, keyed like `rawValues`. */
  units?: Readonly<Record<string, string>>;
  log?: PipelineLog;
};

type ResolvedInput = { input: string; value: string; detectedUnit?: string };

export function isBlank(value: string | null | undefined): boolean {
  return value == null || value.trim() === "";
}

function addToBucket(buckets: ReportBuckets, testName: string, status: MeasuredStatus | "empty"): void {
  switch (status) {
    case "red":
      buckets.abnormal.push(testName);
      return;
    case "yellow":
      buckets.borderline.push(testName);
      return;
    case "green":
      buckets.normal.push(testName);
      return;
    case "empty":
      buckets.notPerformed.push(testName);
      return;
    case "uncheckable":
      return;
    default:
      assertUnreachable(status);
  }
}

export function aggregate(
  rawValues: Readonly<Record<string, string>>,
  catalog: Catalog,
  resolver: Resolver,
  interpreter: Interpreter,
  options: AggregateOptions = {},
): AggregateResult {
  const log = options.log ?? silentLog;
  const resolutions: NameResolution[] = [];
  const unresolved: string[] = [];
  const orphaned: Array<{ input: string; canonicalName: string }> = [];
  const byCanonical = new Map<string, ResolvedInput>();

  for (const [input, value] of Object.entries(rawValues)) {
    const result = resolver.resolve(input);
    resolutions.push({ input, result });

    if (result.confidence === "none") {
      unresolved.push(input);
      log.info({ input, bestScore: result.bestScore }, "Could not map test name");
      continue;
    }
    if (result.confidence === "fuzzy") {
      log.debug({ input, canonicalName: result.canonicalName, score: result.score }, "Fuzzy matched test name");
    }
    if (!catalog.byName.has(result.canonicalName)) {
      orphaned.push({ input, canonicalName: result.canonicalName });
      log.warn({ input, canonicalName: result.canonicalName }, "Alias target is not in the catalog; value dropped");
      continue;
    }

    const previous = byCanonical.get(result.canonicalName);
    if (previous) {
      // A blank input never displaces a measured one.
      if (isBlank(value) && !isBlank(previous.value)) {
        log.warn(
          { canonicalName: result.canonicalName, kept: previous.input, ignored: input },
          "Several inputs resolved to the same test; ignoring the blank one",
        );
        continue;
      }
      log.warn(
        { canonicalName: result.canonicalName, kept: input, replaced: previous.input },
        "Several inputs resolved to the same test; keeping the later one",
      );
    }
    const units = options.units;
    const detectedUnit = units && Object.hasOwn(units, input) ? units[input]?.trim() : undefined;
    byCanonical.set(result.canonicalName, {
      input,
      value,
      ...(detectedUnit ? { detectedUnit } : {}),
    });
  }

  const records = new Map<string, ClassifiedRecord>();
  const buckets: ReportBuckets = { abnormal: [], borderline: [], normal: [], notPerformed: [] };

  for (const test of catalog.tests) {
    const supplied = byCanonical.get(test.name);
    const reference = {
      ...(test.min !== undefined ? { min: test.min } : {}),
      ...(test.max !== undefined ? { max: test.max } : {}),
      ...(test.healthyValue !== undefined ? { healthyValue: test.healthyValue } : {}),
    };
    // Blank values never reach the numeric parser.
    const status = supplied == null || isBlank(supplied.value) ? "empty" : interpreter.classify(supplied.value, reference);

    records.set(test.name, {
      testName: test.name,
      value: supplied?.value ?? "",
      unit: test.unit,
      ...reference,
      status,
      ...(supplied?.detectedUnit ? { detectedUnit: supplied.detectedUnit } : {}),
    });
    addToBucket(buckets, test.name, status);
  }

  const summary = buildSummary(buckets);
  log.info(
    {
      tests: records.size,
      abnormal: buckets.abnormal.length,
      borderline: buckets.borderline.length,
      normal: buckets.normal.length,
      not_performed: buckets.notPerformed.length,
      unresolved: unresolved.length,
      orphaned: orphaned.length,
    },
    "Report aggregated",
  );

  return { records, buckets, summary, unresolved, orphaned, resolutions };
}
