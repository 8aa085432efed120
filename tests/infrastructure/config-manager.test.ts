import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigManager, DEFAULT_APP_CONFIG } from "../../src/infrastructure/config/config-manager";

describe("ConfigManager", () => {
  it("starts from the defaults", () => {
    const config = new ConfigManager();

    expect(config.getRetrievalConfig()).toEqual({
      resultLimit: 5,
      excludeZeroScores: true,
      numericBounds: "static",
    });
    expect(config.getReportConfig()).toEqual({
      outputDir: path.resolve(process.cwd(), "reports"),
      filePrefix: "movie_search_results",
    });
    expect(config.getDataSourceConfig().casesPath).toBe(
      path.resolve(process.cwd(), "data/movies.csv"),
    );
    expect(config.getLoggingConfig().level).toBe("INFO");
  });

  it("overrides only the given keys of each section", () => {
    const config = new ConfigManager({
      retrieval: { resultLimit: 10, excludeZeroScores: undefined },
      logging: { level: "WARN" },
    });

    expect(config.getRetrievalConfig()).toEqual({
      resultLimit: 10,
      excludeZeroScores: true,
      numericBounds: "static",
    });
    expect(config.getLoggingConfig()).toEqual({ level: "WARN" });
    expect(config.getReportConfig()).toEqual(DEFAULT_APP_CONFIG.report);
  });

  describe("fromEnvironment", () => {
    it("keeps the defaults for unset variables", () => {
      expect(ConfigManager.fromEnvironment({}).getConfig()).toEqual(DEFAULT_APP_CONFIG);
    });

    it("reads every supported variable", () => {
      const config = ConfigManager.fromEnvironment({
        MOVIE_CASES_PATH: "fixtures/movies.csv",
        RESULT_LIMIT: "3",
        EXCLUDE_ZERO_SCORES: "no",
        NUMERIC_BOUNDS: "caseBase",
        REPORT_DIR: "out",
        REPORT_PREFIX: "run",
        LOG_LEVEL: " debug ",
        UNRELATED: "ignored",
      });

      expect(config.getConfig()).toEqual({
        dataSource: { casesPath: path.resolve("fixtures/movies.csv") },
        retrieval: { resultLimit: 3, excludeZeroScores: false, numericBounds: "caseBase" },
        report: { outputDir: path.resolve("out"), filePrefix: "run" },
        logging: { level: "DEBUG" },
      });
    });

    it("rejects invalid values", () => {
      expect(() => ConfigManager.fromEnvironment({ RESULT_LIMIT: "-2" })).toThrowError(
        /^Invalid environment configuration: RESULT_LIMIT: /,
      );
      expect(() => ConfigManager.fromEnvironment({ NUMERIC_BOUNDS: "dynamic" })).toThrowError(
        /^Invalid environment configuration: NUMERIC_BOUNDS: /,
      );
      expect(() => ConfigManager.fromEnvironment({ LOG_LEVEL: "verbose" })).toThrowError(
        /^Invalid environment configuration: LOG_LEVEL: /,
      );
    });
  });
});
