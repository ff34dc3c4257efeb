/**
 * Structural logger accepted by the pipeline modules. Fastify's app.log / req.log (pino)
 * satisfy it, so callers pass whichever logger carries their request context.
 */
export type PipelineLog = {
  debug: (o: unknown, msg: string) => void;
  info: (o: unknown, msg: string) => void;
  warn: (o: unknown, msg: string) => void;
};

const noop = () => undefined;

export const silentLog: PipelineLog = { debug: noop, info: noop, warn: noop };
