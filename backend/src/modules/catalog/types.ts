/**
 * Reference catalog shapes. Both values are frozen after load and shared by reference
 * between the resolver, the interpreter and every report built from them.
 */

/** One canonical lab parameter. Any of min / max / healthyValue may be absent. */
export type CanonicalTest = {
  name: string;
  unit: string;
  category: string;
  min?: string;
  max?: string;
  healthyValue?: string;
};

export type CatalogCategory = {
  name: string;
  tests: readonly CanonicalTest[];
};

export type Catalog = {
  categories: readonly CatalogCategory[];
  /** Flattened tests in file order; this order drives tie-breaks and report ordering. */
  tests: readonly CanonicalTest[];
  byName: ReadonlyMap<string, CanonicalTest>;
};

/** Lower-cased, trimmed alias → canonical name. Targets are not checked against the catalog. */
export type AliasTable = ReadonlyMap<string, string>;
