import type { FastifyInstance } from "fastify";
import { AppError } from "../../libs/errors.js";
import type { PipelineContext } from "../pipeline/context.js";
import { normalizeExtraction, parseExtractionText, type NormalizedExtraction } from "../pipeline/extraction/normalize.js";
import { classifyRaw } from "../pipeline/interpreter/index.js";
import { aggregate, buildReportTable, isBlank, reportTableToCsv, toWireRecords } from "../pipeline/report/index.js";

type ResolveBody = { names: string[] };

type ClassifyBody = {
  value: string;
  min?: string;
  max?: string;
  healthy_value?: string;
  tolerance?: number;
};

type ReportBody = {
  values?: Record<string, string>;
  units?: Record<string, string>;
  extraction?: Record<string, unknown>;
  extraction_text?: string;
};

const stringMap = { type: "object", additionalProperties: { type: "string" } } as const;

const reportBodySchema = {
  type: "object",
  properties: {
    values: stringMap,
    units: stringMap,
    extraction: { type: "object" },
    extraction_text: { type: "string" },
  },
} as const;

/** Explicit values win over an extraction payload; exactly one source is required. */
function reportInput(body: ReportBody): NormalizedExtraction {
  if (body.values) {
    return { values: body.values, units: body.units ?? {}, skipped: [], metadata: null };
  }
  const raw = body.extraction ?? (body.extraction_text != null ? parseExtractionText(body.extraction_text) : undefined);
  if (raw === undefined) {
    throw new AppError({
      statusCode: 400,
      code: "VALIDATION_ERROR",
      message: "One of values, extraction or extraction_text is required",
    });
  }
  return normalizeExtraction(raw);
}

export async function registerReportsRoutes(app: FastifyInstance, ctx: PipelineContext) {
  app.post<{ Body: ResolveBody }>(
    "/resolve",
    {
      schema: {
        body: {
          type: "object",
          required: ["names"],
          properties: { names: { type: "array", items: { type: "string" }, maxItems: 500 } },
        },
      },
    },
    async (req) => ({
      results: req.body.names.map((input) => {
        const result = ctx.resolver.resolve(input);
        return {
          input,
          canonical_name: result.canonicalName ?? null,
          confidence: result.confidence,
          ...(result.confidence === "fuzzy" ? { score: result.score } : {}),
        };
      }),
    }),
  );

  app.post<{ Body: ClassifyBody }>(
    "/classify",
    {
      schema: {
        body: {
          type: "object",
          required: ["value"],
          properties: {
            value: { type: "string" },
            min: { type: "string" },
            max: { type: "string" },
            healthy_value: { type: "string" },
            tolerance: { type: "number", minimum: 0, exclusiveMaximum: 0.5 },
          },
        },
      },
    },
    async (req) => {
      const body = req.body;
      if (isBlank(body.value)) return { status: "empty" as const };
      const reference = {
        ...(body.min !== undefined ? { min: body.min } : {}),
        ...(body.max !== undefined ? { max: body.max } : {}),
        ...(body.healthy_value !== undefined ? { healthyValue: body.healthy_value } : {}),
      };
      const status =
        body.tolerance !== undefined
          ? classifyRaw(body.value, reference, body.tolerance)
          : ctx.interpreter.classify(body.value, reference);
      return { status };
    },
  );

  app.post<{ Body: ReportBody }>("/reports", { schema: { body: reportBodySchema } }, async (req) => {
    const input = reportInput(req.body);
    const report = aggregate(input.values, ctx.catalog, ctx.resolver, ctx.interpreter, {
      units: input.units,
      log: req.log,
    });
    return {
      records: toWireRecords(report.records),
      summary: report.summary,
      buckets: {
        abnormal: report.buckets.abnormal,
        borderline: report.buckets.borderline,
        normal: report.buckets.normal,
        not_performed: report.buckets.notPerformed,
      },
      unresolved: report.unresolved,
      orphaned: report.orphaned.map((o) => ({ input: o.input, canonical_name: o.canonicalName })),
      skipped: input.skipped,
      metadata: input.metadata,
    };
  });

  app.post<{ Body: ReportBody }>("/reports/csv", { schema: { body: reportBodySchema } }, async (req, reply) => {
    const input = reportInput(req.body);
    const report = aggregate(input.values, ctx.catalog, ctx.resolver, ctx.interpreter, {
      units: input.units,
      log: req.log,
    });
    const csv = reportTableToCsv(buildReportTable(report.records.values()));
    reply.header("Content-Disposition", 'attachment; filename="lab-report.csv"');
    reply.type("text/csv; charset=utf-8");
    return csv;
  });
}
