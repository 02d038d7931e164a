// src/lib/config.ts
import { ConfigError } from "./errors";

export type OutputFiles = {
  tableStats: string;
  summary: string;
  outliers: string;
  findings: string;
};

export type EdaConfig = {
  rawPath: string;
  processedPath: string;
  outputFiles: OutputFiles;
  outlierMultiplier: number;
  minNumericRatio: number;
  excludeIdColumns: boolean;
  commonNumericOnly: boolean;
  decimals: number;
};

export const DEFAULT_OUTPUT_FILES: OutputFiles = {
  tableStats: "Column-RowCount-duplicate.csv",
  summary: "Summary_Statistics.csv",
  outliers: "Outliers.csv",
  findings: "Findings.csv",
};

type Env = Record<string, string | undefined>;

function str(env: Env, key: string, fallback: string) {
  const v = env[key]?.trim();
  return v ? v : fallback;
}

function num(env: Env, key: string, fallback: number, check: (n: number) => boolean, expected: string) {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || !check(n)) throw new ConfigError(key, `expected ${expected}, got "${raw}"`);
  return n;
}

function bool(env: Env, key: string, fallback: boolean) {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(key, `expected a boolean, got "${raw}"`);
}

/** Read settings from the environment (call `dotenv.config()` first to pick up `.env`). */
export function loadConfig(env: Env = process.env): EdaConfig {
  return {
    rawPath: str(env, "EDA_RAW_PATH", "./data/raw"),
    processedPath: str(env, "EDA_PROCESSED_PATH", "./data/processed"),
    outputFiles: { ...DEFAULT_OUTPUT_FILES },
    outlierMultiplier: num(env, "EDA_OUTLIER_MULTIPLIER", 1.5, (n) => n > 0, "a positive number"),
    minNumericRatio: num(env, "EDA_MIN_NUMERIC_RATIO", 1, (n) => n > 0 && n <= 1, "a ratio in (0, 1]"),
    excludeIdColumns: bool(env, "EDA_EXCLUDE_ID_COLUMNS", true),
    commonNumericOnly: bool(env, "EDA_COMMON_NUMERIC_ONLY", false),
    decimals: num(env, "EDA_DECIMALS", 4, (n) => Number.isInteger(n) && n >= 0 && n <= 15, "an integer in [0, 15]"),
  };
}
