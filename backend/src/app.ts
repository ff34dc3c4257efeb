import Fastify from "fastify";
import { loadConfig, type AppConfig } from "./libs/config.js";
import { setErrorHandler } from "./libs/errors.js";
import { loadReferenceData, registerCatalogModule, type ReferenceData } from "./modules/catalog/index.js";
import { createPipelineContext } from "./modules/pipeline/context.js";
import { registerReportsModule } from "./modules/reports/index.js";

export type BuildAppOptions = {
  config?: AppConfig;
  /** Pre-loaded reference data; when omitted it is read from config.catalogPath / aliasesPath. */
  reference?: ReferenceData;
  /** false silences request logging (tests). */
  logger?: boolean;
};

export async function buildApp(opts: BuildAppOptions = {}) {
  const config = opts.config ?? loadConfig();

  const app = Fastify({
    logger: opts.logger === false ? false : { level: config.logLevel },
    trustProxy: true,
  });

  setErrorHandler(app);

  // Reference data is loaded once; a catalog that cannot be loaded stops startup.
  const reference = opts.reference ?? (await loadReferenceData(config, app.log));
  const ctx = createPipelineContext(reference, {
    fuzzyCutoff: config.fuzzyCutoff,
    rangeTolerance: config.rangeTolerance,
  });

  // Health
  app.get("/healthz", async (req) => ({ ok: true, requestId: req.id, tests: ctx.catalog.tests.length }));

  await registerCatalogModule(app, ctx.catalog);
  await registerReportsModule(app, ctx);

  return app;
}
