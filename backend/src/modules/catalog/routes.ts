import type { FastifyInstance } from "fastify";
import { AppError } from "../../libs/errors.js";
import type { CanonicalTest, Catalog } from "./types.js";

function toWireTest(test: CanonicalTest) {
  return {
    name: test.name,
    category: test.category,
    units: test.unit,
    min: test.min ?? null,
    max: test.max ?? null,
    healthy_value: test.healthyValue ?? null,
  };
}

export async function registerCatalogRoutes(app: FastifyInstance, catalog: Catalog) {
  app.get("/catalog", async () => ({
    categories: catalog.categories.map((c) => ({ name: c.name, tests: c.tests.map(toWireTest) })),
  }));

  app.get<{ Params: { name: string } }>(
    "/catalog/tests/:name",
    {
      schema: {
        params: { type: "object", required: ["name"], properties: { name: { type: "string" } } },
      },
    },
    async (req) => {
      const test = catalog.byName.get(req.params.name);
      if (!test) throw new AppError({ statusCode: 404, code: "NOT_FOUND", message: `Test not found: ${req.params.name}` });
      return toWireTest(test);
    },
  );
}
