import { buildAliasTable, buildCatalog } from "../src/modules/catalog/service.js";
import type { CatalogSource } from "../src/modules/catalog/service.js";
import type { PipelineLog } from "../src/libs/log.js";
import { vi } from "vitest";

export const SMALL_CATALOG_SOURCE: CatalogSource = {
  categories: [
    {
      name: "Blood",
      tests: [
        { name: "Hemoglobin", units: "g/L", min: "120", max: "150" },
        { name: "Alanine Aminotransferase", units: "U/L", healthy_value: "<35" },
      ],
    },
    {
      name: "Other",
      tests: [
        { name: "Blood Group", units: "" },
        { name: "Vitamin D", units: "nmol/L", min: "75" },
      ],
    },
  ],
};

export const smallCatalog = () => buildCatalog(SMALL_CATALOG_SOURCE);

export const smallAliases = () =>
  buildAliasTable({
    Haemoglobin: "Hemoglobin",
    Hb: "Hemoglobin",
    ALT: "Alanine Aminotransferase",
  });

export function spyLog() {
  return {
    debug: vi.fn<PipelineLog["debug"]>(),
    info: vi.fn<PipelineLog["info"]>(),
    warn: vi.fn<PipelineLog["warn"]>(),
  };
}

/** Run fn and hand back whatever it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
