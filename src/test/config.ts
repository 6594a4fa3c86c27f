import { ConfigProvider } from "effect";

/**
 * Shared test configuration interface used across all test files.
 */
export interface TestConfig {
  census: {
    apiKey: string;
    baseUrl: string;
    fields: string;
    geography: string;
    applyDemographicFilters: boolean;
  };
  storage: {
    dataDir: string;
  };
}

/**
 * Creates a ConfigProvider from a TestConfig object.
 * Maps all config values to their corresponding environment variable names.
 */
export const createTestConfigProvider = (config: TestConfig) =>
  ConfigProvider.fromMap(
    new Map([
      ["CENSUS_API_KEY", config.census.apiKey],
      ["CENSUS_BASE_URL", config.census.baseUrl],
      ["CENSUS_FIELDS", config.census.fields],
      ["CENSUS_GEOGRAPHY", config.census.geography],
      ["APPLY_DEMOGRAPHIC_FILTERS", config.census.applyDemographicFilters.toString()],
      ["DATA_DIR", config.storage.dataDir],
    ])
  );

/**
 * Creates a default test configuration with sensible test values.
 */
export const createTestConfig = (overrides: Partial<TestConfig["census"]> = {}): TestConfig => ({
  census: {
    apiKey: "test-key",
    baseUrl: "https://api.census.gov/data/2017/popproj/pop",
    fields: "POP,YEAR,RACE,SEX,AGE",
    geography: "us:*",
    applyDemographicFilters: false,
    ...overrides,
  },
  storage: {
    dataDir: "test-data",
  },
});
