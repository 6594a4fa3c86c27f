import { describe, expect, it } from "@effect/vitest";
import { ConfigProvider, Effect, Layer } from "effect";
import { AppConfig } from "./config";

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Layer.setConfigProvider(ConfigProvider.fromMap(new Map(entries)));

describe("AppConfig", () => {
  it.effect("should apply defaults when only the API key is set", () =>
    Effect.gen(function* () {
      const config = yield* AppConfig;

      expect(config).toEqual({
        census: {
          apiKey: "test-key",
          baseUrl: "https://api.census.gov/data/2017/popproj/pop",
          fields: "POP,YEAR,RACE,SEX,AGE",
          geography: "us:*",
          applyDemographicFilters: false,
        },
        storage: { dataDir: "data" },
      });
    }).pipe(Effect.provide(withEnv([["CENSUS_API_KEY", "test-key"]])))
  );

  it.effect("should parse APPLY_DEMOGRAPHIC_FILTERS", () =>
    Effect.gen(function* () {
      const config = yield* AppConfig;
      expect(config.census.applyDemographicFilters).toBe(true);
    }).pipe(
      Effect.provide(
        withEnv([
          ["CENSUS_API_KEY", "test-key"],
          ["APPLY_DEMOGRAPHIC_FILTERS", "TRUE"],
        ])
      )
    )
  );

  it.effect("should fail without an API key", () =>
    Effect.gen(function* () {
      const result = yield* Effect.either(AppConfig);
      expect(result._tag).toBe("Left");
    }).pipe(Effect.provide(withEnv([])))
  );
});
