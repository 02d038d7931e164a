import { describe, it, expect } from "vitest";
import { DEFAULT_OUTPUT_FILES, loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      rawPath: "./data/raw",
      processedPath: "./data/processed",
      outputFiles: DEFAULT_OUTPUT_FILES,
      outlierMultiplier: 1.5,
      minNumericRatio: 1,
      excludeIdColumns: true,
      commonNumericOnly: false,
      decimals: 4,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      EDA_RAW_PATH: "/in",
      EDA_PROCESSED_PATH: "/out",
      EDA_OUTLIER_MULTIPLIER: "3",
      EDA_MIN_NUMERIC_RATIO: "0.9",
      EDA_EXCLUDE_ID_COLUMNS: "no",
      EDA_COMMON_NUMERIC_ONLY: "TRUE",
      EDA_DECIMALS: "1",
    });
    expect(config).toMatchObject({
      rawPath: "/in",
      processedPath: "/out",
      outlierMultiplier: 3,
      minNumericRatio: 0.9,
      excludeIdColumns: false,
      commonNumericOnly: true,
      decimals: 1,
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ EDA_RAW_PATH: "  ", EDA_DECIMALS: "" })).toMatchObject({ rawPath: "./data/raw", decimals: 4 });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ EDA_OUTLIER_MULTIPLIER: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ EDA_OUTLIER_MULTIPLIER: "-1" })).toThrow(ConfigError);
    expect(() => loadConfig({ EDA_MIN_NUMERIC_RATIO: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ EDA_DECIMALS: "2.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ EDA_EXCLUDE_ID_COLUMNS: "maybe" })).toThrow(
      'EDA_EXCLUDE_ID_COLUMNS: expected a boolean, got "maybe"',
    );
  });
});
