import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { buildApp } from "../src/app.js";
import { loadConfig } from "../src/libs/config.js";
import { buildAliasTable } from "../src/modules/catalog/service.js";
import { smallCatalog } from "./helpers.js";

let app: FastifyInstance;

beforeAll(async () => {
  app = await buildApp({
    config: loadConfig({}),
    reference: { catalog: smallCatalog(), aliases: buildAliasTable({ haemoglobin: "Hemoglobin" }) },
    logger: false,
  });
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

describe("GET /healthz", () => {
  test("reports catalog size", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, tests: 4 });
  });
});

describe("catalog routes", () => {
  test("GET /catalog lists categories with wire fields", async () => {
    const res = await app.inject({ method: "GET", url: "/catalog" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.categories.map((c: { name: string }) => c.name)).toEqual(["Blood", "Other"]);
    expect(body.categories[0].tests[1]).toEqual({
      name: "Alanine Aminotransferase",
      category: "Blood",
      units: "U/L",
      min: null,
      max: null,
      healthy_value: "<35",
    });
  });

  test("GET /catalog/tests/:name", async () => {
    const res = await app.inject({ method: "GET", url: "/catalog/tests/Vitamin%20D" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      name: "Vitamin D",
      category: "Other",
      units: "nmol/L",
      min: "75",
      max: null,
      healthy_value: null,
    });
  });

  test("unknown test is 404", async () => {
    const res = await app.inject({ method: "GET", url: "/catalog/tests/Nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toEqual({ code: "NOT_FOUND", message: "Test not found: Nope" });
  });
});

describe("POST /resolve", () => {
  test("returns confidence per name and a score for fuzzy matches", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/resolve",
      payload: { names: ["Haemoglobin", "Vitamine D", "HGB"] },
    });
    expect(res.statusCode).toBe(200);
    const { results } = res.json();
    expect(results[0]).toEqual({ input: "Haemoglobin", canonical_name: "Hemoglobin", confidence: "alias" });
    expect(results[1]).toMatchObject({ input: "Vitamine D", canonical_name: "Vitamin D", confidence: "fuzzy" });
    expect(results[1].score).toBeCloseTo(1800 / 19, 10);
    expect(results[2]).toEqual({ input: "HGB", canonical_name: null, confidence: "none" });
  });

  test("names is required", async () => {
    const res = await app.inject({ method: "POST", url: "/resolve", payload: {} });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe("VALIDATION_ERROR");
  });
});

describe("POST /classify", () => {
  test("inequality reference", async () => {
    const res = await app.inject({ method: "POST", url: "/classify", payload: { value: "52", healthy_value: "<35" } });
    expect(res.json()).toEqual({ status: "yellow" });
  });

  test("blank value is empty", async () => {
    const res = await app.inject({ method: "POST", url: "/classify", payload: { value: "  ", min: "1", max: "2" } });
    expect(res.json()).toEqual({ status: "empty" });
  });

  test("per-request tolerance", async () => {
    const payload = { value: "125", min: "120", max: "150" };
    const byDefault = await app.inject({ method: "POST", url: "/classify", payload });
    const wider = await app.inject({ method: "POST", url: "/classify", payload: { ...payload, tolerance: 0.2 } });
    expect(byDefault.json()).toEqual({ status: "green" });
    expect(wider.json()).toEqual({ status: "yellow" });
  });

  test("tolerance of 0.5 or more is rejected", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/classify",
      payload: { value: "125", min: "120", max: "150", tolerance: 0.7 },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe("VALIDATION_ERROR");
  });
});

describe("POST /reports", () => {
  test("from explicit values", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/reports",
      payload: {
        values: { Haemoglobin: "145", "Vitamin D": "50", Zzyzx: "1" },
        units: { Haemoglobin: "g/L" },
      },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(Object.keys(body.records)).toEqual(["Hemoglobin", "Alanine Aminotransferase", "Blood Group", "Vitamin D"]);
    expect(body.records.Hemoglobin).toEqual({
      value: "145",
      min: "120",
      max: "150",
      units: "g/L",
      status: "green",
      healthy_value: null,
      detected_units: "g/L",
    });
    expect(body.records["Vitamin D"].status).toBe("yellow");
    expect(body.buckets).toEqual({
      abnormal: [],
      borderline: ["Vitamin D"],
      normal: ["Hemoglobin"],
      not_performed: ["Alanine Aminotransferase", "Blood Group"],
    });
    expect(body.summary).toBe(
      "Borderline: Vitamin D\nNormal: Hemoglobin\nNot performed: Alanine Aminotransferase, Blood Group",
    );
    expect(body.unresolved).toEqual(["Zzyzx"]);
    expect(body.orphaned).toEqual([]);
    expect(body.skipped).toEqual([]);
    expect(body.metadata).toBeNull();
  });

  test("from an extraction payload", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/reports",
      payload: {
        extraction: {
          metadata: { lab: "Test Lab", patient: { sex: "Male", age: 50 } },
          tests: { "Alanine Aminotransferase": { value: 33, unit: "U/L" }, Ferritin: { value: null } },
        },
      },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.records["Alanine Aminotransferase"]).toMatchObject({ value: "33", status: "green", detected_units: "U/L" });
    expect(body.skipped).toEqual(["Ferritin"]);
    expect(body.metadata).toEqual({ lab: "Test Lab", patient: { sex: "Male", age: 50 } });
    expect(body.unresolved).toEqual([]);
  });

  test("from raw model text", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/reports",
      payload: { extraction_text: '```json\n{"tests":[{"test_name":"Hemoglobin","value":"160"}]}\n```' },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().buckets.abnormal).toEqual(["Hemoglobin"]);
  });

  test("a body with no source is rejected", async () => {
    const res = await app.inject({ method: "POST", url: "/reports", payload: {} });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toMatchObject({
      code: "VALIDATION_ERROR",
      message: "One of values, extraction or extraction_text is required",
    });
  });

  test("extraction text of unclosed braces is a 400", async () => {
    const res = await app.inject({ method: "POST", url: "/reports", payload: { extraction_text: "{".repeat(100_000) } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("Extraction text does not contain a JSON object");
  });

  test("an invalid extraction payload is rejected", async () => {
    const res = await app.inject({ method: "POST", url: "/reports", payload: { extraction: { metadata: {} } } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("Invalid extraction payload");
  });
});

describe("POST /reports/csv", () => {
  test("returns the performed tests as CSV", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/reports/csv",
      payload: { values: { Haemoglobin: "145" }, units: { Haemoglobin: "g/L" } },
    });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/csv; charset=utf-8");
    expect(res.headers["content-disposition"]).toBe('attachment; filename="lab-report.csv"');
    expect(res.body).toBe(
      'Test,Result,Unit,ReferenceRange,Status\n"Hemoglobin","145 g/L","g/L","120 - 150","NORMAL"',
    );
  });
});
