import path from "node:path";
import { AppError } from "./errors.js";

/**
 * Runtime settings. Values come only from process.env (server.ts loads .env.local / .env
 * into it first); nothing here is hard-coded per environment.
 */
export type AppConfig = {
  port: number;
  host: string;
  logLevel: string;
  catalogPath: string;
  aliasesPath: string;
  fuzzyCutoff: number;
  rangeTolerance: number;
};

export const DEFAULT_FUZZY_CUTOFF = 85;
export const DEFAULT_RANGE_TOLERANCE = 0.1;

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw.trim());
  if (!Number.isFinite(n)) {
    throw new AppError({ statusCode: 500, code: "CONFIG", message: `${key} must be a number (got "${raw}")` });
  }
  return n;
}

function readPath(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return path.resolve(process.cwd(), raw ? raw : fallback);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = readNumber(env, "PORT", 8080);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new AppError({ statusCode: 500, code: "CONFIG", message: `PORT out of range: ${port}` });
  }

  const fuzzyCutoff = readNumber(env, "FUZZY_CUTOFF", DEFAULT_FUZZY_CUTOFF);
  if (fuzzyCutoff < 0 || fuzzyCutoff > 100) {
    throw new AppError({ statusCode: 500, code: "CONFIG", message: `FUZZY_CUTOFF must be within 0..100 (got ${fuzzyCutoff})` });
  }

  // A tolerance of 0.5 or more collapses the interval warn band onto itself.
  const rangeTolerance = readNumber(env, "RANGE_TOLERANCE", DEFAULT_RANGE_TOLERANCE);
  if (rangeTolerance < 0 || rangeTolerance >= 0.5) {
    throw new AppError({ statusCode: 500, code: "CONFIG", message: `RANGE_TOLERANCE must be within [0, 0.5) (got ${rangeTolerance})` });
  }

  return {
    port,
    host: env.HOST?.trim() || "0.0.0.0",
    logLevel: env.LOG_LEVEL?.trim() || "info",
    catalogPath: readPath(env, "CATALOG_PATH", "data/reference.json"),
    aliasesPath: readPath(env, "ALIASES_PATH", "data/aliases.json"),
    fuzzyCutoff,
    rangeTolerance,
  };
}
