import { Config } from "effect";

export interface AppConfig {
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

export const AppConfig = Config.all({
  census: Config.all({
    apiKey: Config.string("CENSUS_API_KEY"),
    baseUrl: Config.string("CENSUS_BASE_URL").pipe(
      Config.withDefault("https://api.census.gov/data/2017/popproj/pop")
    ),
    fields: Config.string("CENSUS_FIELDS").pipe(Config.withDefault("POP,YEAR,RACE,SEX,AGE")),
    geography: Config.string("CENSUS_GEOGRAPHY").pipe(Config.withDefault("us:*")),
    applyDemographicFilters: Config.string("APPLY_DEMOGRAPHIC_FILTERS").pipe(
      Config.map((v) => v.toLowerCase() === "true"),
      Config.withDefault(false)
    ),
  }),
  storage: Config.all({
    dataDir: Config.string("DATA_DIR").pipe(Config.withDefault("data")),
  }),
});
