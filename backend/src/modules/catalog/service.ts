import { readFile } from "node:fs/promises";
import { z } from "zod";
import { AppError } from "../../libs/errors.js";
import { silentLog, type PipelineLog } from "../../libs/log.js";
import type { AliasTable, Catalog, CanonicalTest, CatalogCategory } from "./types.js";

/** Reference fields are strings on disk, but bare numbers are accepted and stringified. */
const referenceField = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((v) => {
    if (v == null) return undefined;
    const s = String(v).trim();
    return s === "" ? undefined : s;
  });

const testSchema = z.object({
  name: z.string().trim().min(1, "Test name is required"),
  units: z.string().nullable().optional(),
  min: referenceField,
  max: referenceField,
  healthy_value: referenceField,
});

const catalogSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string().trim().min(1, "Category name is required"),
      tests: z.array(testSchema),
    }),
  ),
});

const aliasSchema = z.record(z.string(), z.string().trim().min(1));

export type CatalogSource = z.input<typeof catalogSchema>;

async function readJson(filePath: string, what: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new AppError({
      statusCode: 500,
      code: "CATALOG_INVALID",
      message: `${what} could not be read at ${filePath}`,
      details: err instanceof Error ? err.message : String(err),
    });
  }
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new AppError({
      statusCode: 500,
      code: "CATALOG_INVALID",
      message: `${what} at ${filePath} is not valid JSON`,
      details: err instanceof Error ? err.message : String(err),
    });
  }
}

/** Validate and flatten a raw catalog document. Throws CATALOG_INVALID on malformed data. */
export function buildCatalog(raw: unknown): Catalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError({
      statusCode: 500,
      code: "CATALOG_INVALID",
      message: "Reference catalog failed validation",
      details: parsed.error.issues,
    });
  }

  const byName = new Map<string, CanonicalTest>();
  const tests: CanonicalTest[] = [];
  const categories: CatalogCategory[] = parsed.data.categories.map((category) => {
    const categoryTests = category.tests.map((t) => {
      if (byName.has(t.name)) {
        throw new AppError({
          statusCode: 500,
          code: "CATALOG_INVALID",
          message: `Duplicate test name in reference catalog: "${t.name}"`,
        });
      }
      const test: CanonicalTest = Object.freeze({
        name: t.name,
        unit: t.units?.trim() ?? "",
        category: category.name,
        ...(t.min !== undefined ? { min: t.min } : {}),
        ...(t.max !== undefined ? { max: t.max } : {}),
        ...(t.healthy_value !== undefined ? { healthyValue: t.healthy_value } : {}),
      });
      byName.set(test.name, test);
      tests.push(test);
      return test;
    });
    return Object.freeze({ name: category.name, tests: Object.freeze(categoryTests) });
  });

  return Object.freeze({
    categories: Object.freeze(categories),
    tests: Object.freeze(tests),
    byName,
  });
}

/** Keys are trimmed and lower-cased; a later duplicate key overwrites an earlier one. */
export function buildAliasTable(raw: unknown): AliasTable {
  const parsed = aliasSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError({
      statusCode: 500,
      code: "CATALOG_INVALID",
      message: "Alias table failed validation",
      details: parsed.error.issues,
    });
  }
  const table = new Map<string, string>();
  for (const [alias, canonical] of Object.entries(parsed.data)) {
    const key = alias.trim().toLowerCase();
    if (key === "") continue;
    table.set(key, canonical);
  }
  return table;
}

/** Aliases whose target is not a catalog test. They still resolve, but nothing consumes them. */
export function findDanglingAliases(catalog: Catalog, aliases: AliasTable): Array<{ alias: string; canonical: string }> {
  const dangling: Array<{ alias: string; canonical: string }> = [];
  for (const [alias, canonical] of aliases) {
    if (!catalog.byName.has(canonical)) dangling.push({ alias, canonical });
  }
  return dangling;
}

export async function loadCatalog(filePath: string): Promise<Catalog> {
  return buildCatalog(await readJson(filePath, "Reference catalog"));
}

/**
 * A missing alias file is not fatal: the resolver falls back to exact and fuzzy matching.
 * A file that exists but is malformed is.
 */
export async function loadAliasTable(filePath: string, log: PipelineLog = silentLog): Promise<AliasTable> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      log.warn({ filePath }, "Alias file not found; resolving by exact and fuzzy match only");
      return new Map();
    }
    throw new AppError({
      statusCode: 500,
      code: "CATALOG_INVALID",
      message: `Alias table could not be read at ${filePath}`,
      details: err instanceof Error ? err.message : String(err),
    });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text) as unknown;
  } catch (err) {
    throw new AppError({
      statusCode: 500,
      code: "CATALOG_INVALID",
      message: `Alias table at ${filePath} is not valid JSON`,
      details: err instanceof Error ? err.message : String(err),
    });
  }
  return buildAliasTable(raw);
}

export type ReferenceData = { catalog: Catalog; aliases: AliasTable };

/** Load both reference files and report aliases that point at unknown tests. */
export async function loadReferenceData(
  paths: { catalogPath: string; aliasesPath: string },
  log: PipelineLog = silentLog,
): Promise<ReferenceData> {
  const catalog = await loadCatalog(paths.catalogPath);
  const aliases = await loadAliasTable(paths.aliasesPath, log);
  const dangling = findDanglingAliases(catalog, aliases);
  if (dangling.length > 0) {
    log.warn({ dangling }, "Alias entries reference tests missing from the catalog");
  }
  log.info(
    { tests: catalog.tests.length, categories: catalog.categories.length, aliases: aliases.size },
    "Reference data loaded",
  );
  return { catalog, aliases };
}
