export type ResolutionConfidence = "exact" | "alias" | "fuzzy" | "none";

/** Provenance tier of a resolution; `score` is present only for fuzzy hits. */
export type ResolutionResult =
  | { canonicalName: string; confidence: "exact" }
  | { canonicalName: string; confidence: "alias" }
  | { canonicalName: string; confidence: "fuzzy"; score: number }
  | { canonicalName?: undefined; confidence: "none"; bestScore?: number };

export type ResolveOptions = {
  /** Minimum token-sort score (0..100) a fuzzy match needs. Inclusive. */
  cutoff?: number;
};

export interface Resolver {
  readonly targets: readonly string[];
  resolve(inputName: string): ResolutionResult;
}
