import path from "node:path";
import { describe, expect, test } from "vitest";
import { loadConfig } from "../src/libs/config.js";
import { thrown } from "./helpers.js";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      host: "0.0.0.0",
      logLevel: "info",
      catalogPath: path.resolve(process.cwd(), "data/reference.json"),
      aliasesPath: path.resolve(process.cwd(), "data/aliases.json"),
      fuzzyCutoff: 85,
      rangeTolerance: 0.1,
    });
  });

  test("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "3001",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      CATALOG_PATH: "/srv/lab/reference.json",
      FUZZY_CUTOFF: " 90 ",
      RANGE_TOLERANCE: "0.2",
    });
    expect(config).toMatchObject({
      port: 3001,
      host: "127.0.0.1",
      logLevel: "debug",
      catalogPath: "/srv/lab/reference.json",
      fuzzyCutoff: 90,
      rangeTolerance: 0.2,
    });
  });

  test("blank values fall back to defaults", () => {
    expect(loadConfig({ PORT: "  ", FUZZY_CUTOFF: "" })).toMatchObject({ port: 8080, fuzzyCutoff: 85 });
  });

  test.each([
    ["FUZZY_CUTOFF", "high"],
    ["FUZZY_CUTOFF", "101"],
    ["RANGE_TOLERANCE", "0.5"],
    ["RANGE_TOLERANCE", "-0.1"],
    ["PORT", "70000"],
    ["PORT", "80.5"],
  ])("%s=%s is a config error", (key, value) => {
    expect(thrown(() => loadConfig({ [key]: value }))).toMatchObject({ code: "CONFIG", statusCode: 500 });
  });
});
