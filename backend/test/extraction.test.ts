import { describe, expect, test } from "vitest";
import { AppError } from "../src/libs/errors.js";
import { normalizeExtraction, parseExtractionText } from "../src/modules/pipeline/extraction/normalize.js";
import { thrown } from "./helpers.js";

describe("normalizeExtraction", () => {
  test("keyed form: stringifies values, keeps units, skips missing values", () => {
    const result = normalizeExtraction({
      metadata: { report_date: "2026-03-01", lab: "Test Lab", patient: { sex: "Female", age: 41 } },
      tests: {
        Haemoglobin: { value: 145, unit: "g/L", ref_range: "120-150" },
        ALT: { value: "52 ", unit: null },
        Ferritin: { value: null, unit: "µg/L" },
      },
    });
    expect(result).toEqual({
      values: { Haemoglobin: "145", ALT: "52" },
      units: { Haemoglobin: "g/L" },
      skipped: ["Ferritin"],
      metadata: { report_date: "2026-03-01", lab: "Test Lab", patient: { sex: "Female", age: 41 } },
    });
  });

  test("list form is accepted as well", () => {
    const result = normalizeExtraction({
      tests: [
        { test_name: "Platelets", value: 210, unit: "10^9/L" },
        { test_name: "Glucose", value: 5.4 },
      ],
    });
    expect(result.values).toEqual({ Platelets: "210", Glucose: "5.4" });
    expect(result.units).toEqual({ Platelets: "10^9/L" });
    expect(result.metadata).toBeNull();
  });

  test("rejects payloads without tests", () => {
    const err = thrown(() => normalizeExtraction({ metadata: {} }));
    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ statusCode: 400, code: "VALIDATION_ERROR" });
  });

  test("rejects non-scalar values", () => {
    expect(thrown(() => normalizeExtraction({ tests: { Hb: { value: [1, 2] } } }))).toMatchObject({
      code: "VALIDATION_ERROR",
    });
  });
});

describe("parseExtractionText", () => {
  test("pulls the JSON object out of fenced model output", () => {
    const text = 'Here you go:\n```json\n{ "tests": { "Hb": { "value": 13.2 } } }\n```\n';
    expect(parseExtractionText(text)).toEqual({ tests: { Hb: { value: 13.2 } } });
  });

  test("text without an object is a validation error", () => {
    expect(thrown(() => parseExtractionText("no results found"))).toMatchObject({
      statusCode: 400,
      code: "VALIDATION_ERROR",
      message: "Extraction text does not contain a JSON object",
    });
  });

  test("a long run of opening braces fails fast", () => {
    const started = performance.now();
    expect(thrown(() => parseExtractionText("{".repeat(200_000)))).toMatchObject({
      statusCode: 400,
      code: "VALIDATION_ERROR",
    });
    expect(performance.now() - started).toBeLessThan(500);
  });

  test("unbalanced braces inside the object are a JSON error", () => {
    expect(thrown(() => parseExtractionText('note { "tests": { } trailing }'))).toMatchObject({
      code: "VALIDATION_ERROR",
    });
  });
});
