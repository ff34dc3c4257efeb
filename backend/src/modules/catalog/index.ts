import type { FastifyInstance } from "fastify";
import { registerCatalogRoutes } from "./routes.js";
import type { Catalog } from "./types.js";

export async function registerCatalogModule(app: FastifyInstance, catalog: Catalog) {
  await registerCatalogRoutes(app, catalog);
}

export {
  buildAliasTable,
  buildCatalog,
  findDanglingAliases,
  loadAliasTable,
  loadCatalog,
  loadReferenceData,
} from "./service.js";
export type { CatalogSource, ReferenceData } from "./service.js";
export type { AliasTable, Catalog, CanonicalTest, CatalogCategory } from "./types.js";
