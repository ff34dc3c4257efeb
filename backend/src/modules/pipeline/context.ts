import { DEFAULT_FUZZY_CUTOFF, DEFAULT_RANGE_TOLERANCE } from "../../libs/config.js";
import type { AliasTable, Catalog } from "../catalog/types.js";
import { createInterpreter, type Interpreter } from "./interpreter/index.js";
import { createResolver, type Resolver } from "./resolver/index.js";

/**
 * Everything a report needs, built once at startup. Immutable; every request shares it.
 */
export type PipelineContext = {
  catalog: Catalog;
  aliases: AliasTable;
  resolver: Resolver;
  interpreter: Interpreter;
};

export function createPipelineContext(
  reference: { catalog: Catalog; aliases: AliasTable },
  settings: { fuzzyCutoff?: number; rangeTolerance?: number } = {},
): PipelineContext {
  const { catalog, aliases } = reference;
  return Object.freeze({
    catalog,
    aliases,
    resolver: createResolver(
      catalog.tests.map((t) => t.name),
      aliases,
      { cutoff: settings.fuzzyCutoff ?? DEFAULT_FUZZY_CUTOFF },
    ),
    interpreter: createInterpreter({ tolerance: settings.rangeTolerance ?? DEFAULT_RANGE_TOLERANCE }),
  });
}
