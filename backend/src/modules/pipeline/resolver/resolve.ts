/**
 * Name resolution: exact → alias → fuzzy, first hit wins. Pure; no AI.
 */

import { DEFAULT_FUZZY_CUTOFF } from "../../../libs/config.js";
import type { AliasTable } from "../../catalog/types.js";
import { tokenSortRatio } from "./similarity.js";
import type { ResolutionResult, ResolveOptions, Resolver } from "./types.js";

function clean(name: string): string {
  return name.trim().toLowerCase();
}

/** Case-insensitive, trimmed equality. Returns the target as spelled in the catalog. */
export function findExact(inputName: string, targets: readonly string[]): string | undefined {
  const wanted = clean(inputName);
  return targets.find((t) => clean(t) === wanted);
}

/**
 * Best token-sort match. Strictly-greater comparison keeps the first target on ties,
 * so catalog order decides.
 */
export function bestFuzzyMatch(
  inputName: string,
  targets: readonly string[],
): { target: string; score: number } | null {
  let best: { target: string; score: number } | null = null;
  for (const target of targets) {
    const score = tokenSortRatio(inputName, target);
    if (best == null || score > best.score) best = { target, score };
  }
  return best;
}

export function resolve(
  inputName: string,
  targets: readonly string[],
  aliases: AliasTable,
  options: ResolveOptions = {},
): ResolutionResult {
  const cutoff = options.cutoff ?? DEFAULT_FUZZY_CUTOFF;
  const key = clean(inputName);
  if (key === "") return { confidence: "none" };

  const exact = findExact(key, targets);
  if (exact !== undefined) return { canonicalName: exact, confidence: "exact" };

  // Alias targets are returned as-is; membership in `targets` is the caller's concern.
  const aliased = aliases.get(key);
  if (aliased !== undefined) return { canonicalName: aliased, confidence: "alias" };

  const best = bestFuzzyMatch(key, targets);
  if (best == null) return { confidence: "none" };
  if (best.score >= cutoff) return { canonicalName: best.target, confidence: "fuzzy", score: best.score };
  return { confidence: "none", bestScore: best.score };
}

/** Bind a resolver to one catalog's names and alias table. */
export function createResolver(
  targets: readonly string[],
  aliases: AliasTable,
  options: ResolveOptions = {},
): Resolver {
  const frozenTargets = Object.freeze([...targets]);
  return {
    targets: frozenTargets,
    resolve: (inputName: string) => resolve(inputName, frozenTargets, aliases, options),
  };
}
