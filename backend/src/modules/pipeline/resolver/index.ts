export { resolve, createResolver, findExact, bestFuzzyMatch } from "./resolve.js";
export { tokenSortRatio, ratio, sortTokens, lcsLength } from "./similarity.js";
export type { ResolutionResult, ResolutionConfidence, ResolveOptions, Resolver } from "./types.js";
