import type { FastifyInstance } from "fastify";
import type { PipelineContext } from "../pipeline/context.js";
import { registerReportsRoutes } from "./routes.js";

export async function registerReportsModule(app: FastifyInstance, ctx: PipelineContext) {
  await registerReportsRoutes(app, ctx);
}
