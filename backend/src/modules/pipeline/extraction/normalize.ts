/**
 * LLM extraction payload → aggregator input.
 * The extractor itself (PDF text + model call) lives outside this service; this module only
 * validates what it hands over and flattens it into name → value / name → unit maps.
 */

import { z } from "zod";
import { AppError } from "../../../libs/errors.js";

const scalar = z.union([z.string(), z.number()]).nullable().optional();

const testEntry = z.object({
  value: scalar,
  unit: z.string().nullable().optional(),
  ref_range: z.string().nullable().optional(),
});

const listedTest = testEntry.extend({ test_name: z.string().trim().min(1) });

export const extractionSchema = z.object({
  metadata: z
    .object({
      report_date: z.string().nullable().optional(),
      lab: z.string().nullable().optional(),
      patient: z
        .object({
          sex: z.string().nullable().optional(),
          age: z.number().nullable().optional(),
        })
        .nullable()
        .optional(),
    })
    .nullable()
    .optional(),
  // Keyed by test name, or the list form with test_name on each entry.
  tests: z.union([z.record(z.string(), testEntry), z.array(listedTest)]),
});

export type ExtractionPayload = z.infer<typeof extractionSchema>;

export type NormalizedExtraction = {
  values: Record<string, string>;
  units: Record<string, string>;
  /** Tests the extractor listed without a value. */
  skipped: string[];
  metadata: NonNullable<ExtractionPayload["metadata"]> | null;
};

/** Pull the outermost JSON object out of model text that may carry prose or code fences. */
export function parseExtractionText(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end < start) throw noJsonObject();
  try {
    return JSON.parse(text.slice(start, end + 1)) as unknown;
  } catch (err) {
    throw noJsonObject(err instanceof Error ? err.message : String(err));
  }
}

function noJsonObject(details?: string): AppError {
  return new AppError({
    statusCode: 400,
    code: "VALIDATION_ERROR",
    message: "Extraction text does not contain a JSON object",
    ...(details !== undefined ? { details } : {}),
  });
}

export function normalizeExtraction(raw: unknown): NormalizedExtraction {
  const parsed = extractionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError({
      statusCode: 400,
      code: "VALIDATION_ERROR",
      message: "Invalid extraction payload",
      details: parsed.error.issues,
    });
  }

  const entries = Array.isArray(parsed.data.tests)
    ? parsed.data.tests.map((t) => [t.test_name, t] as const)
    : Object.entries(parsed.data.tests);

  const values: Record<string, string> = {};
  const units: Record<string, string> = {};
  const skipped: string[] = [];
  for (const [name, entry] of entries) {
    if (entry.value == null) {
      skipped.push(name);
      continue;
    }
    values[name] = String(entry.value).trim();
    const unit = entry.unit?.trim();
    if (unit) units[name] = unit;
  }

  return { values, units, skipped, metadata: parsed.data.metadata ?? null };
}
