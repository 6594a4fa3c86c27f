import { FetchHttpClient, HttpClient } from "@effect/platform";
import { Data, Effect, Schema } from "effect";
import { AppConfig } from "../config";
import type { DemographicParams } from "./params";

// Census responses are arrays of rows; cells are almost always strings.
export const CensusCell = Schema.Union(Schema.String, Schema.Number, Schema.Null);
export type CensusCell = Schema.Schema.Type<typeof CensusCell>;

const CensusResponse = Schema.Array(Schema.Array(CensusCell));

export interface CensusTable {
  readonly headers: readonly string[];
  readonly rows: ReadonlyArray<readonly CensusCell[]>;
}

export class CensusApiError extends Data.TaggedError("CensusApiError")<{
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}> {}

export class CensusParseError extends Data.TaggedError("CensusParseError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export interface RequestOptions {
  baseUrl: string;
  fields: string;
  geography: string;
  apiKey: string;
  applyDemographicFilters: boolean;
}

export const buildRequestUrl = (options: RequestOptions, params: DemographicParams): string => {
  const base = `${options.baseUrl}?get=${options.fields}&for=${options.geography}&key=${options.apiKey}`;
  if (!options.applyDemographicFilters) {
    return base;
  }
  const filters = Object.entries(params)
    .map(([name, value]) => `&${name}=${encodeURIComponent(value)}`)
    .join("");
  return base + filters;
};

export const redactApiKey = (url: string, apiKey: string): string =>
  apiKey ? url.split(`key=${apiKey}`).join("key=REDACTED") : url;

/**
 * Splits a decoded response into its header row and data rows.
 */
export const splitTable = (
  body: ReadonlyArray<readonly CensusCell[]>
): Effect.Effect<CensusTable, CensusParseError> => {
  if (body.length === 0) {
    return Effect.fail(new CensusParseError({ message: "Response contained no header row" }));
  }
  const [headerRow, ...rows] = body;
  return Effect.succeed({
    headers: headerRow.map((cell) => String(cell)),
    rows,
  });
};

export class CensusService extends Effect.Service<CensusService>()("CensusService", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const httpClient = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);

    const fetchTable = (
      params: DemographicParams
    ): Effect.Effect<CensusTable, CensusApiError | CensusParseError> =>
      Effect.gen(function* () {
        const url = buildRequestUrl(config.census, params);
        yield* Effect.logDebug(`Requesting URL: ${redactApiKey(url, config.census.apiKey)}`);

        // Error messages from the HTTP layer embed the request URL, so the
        // key-bearing text is replaced rather than forwarded.
        const json = yield* httpClient.get(url).pipe(
          Effect.flatMap((res) => res.json),
          Effect.scoped,
          Effect.mapError((error) => {
            if (error._tag === "RequestError") {
              return new CensusApiError({
                message: `Census API request failed (${error.reason})`,
                cause: error,
              });
            }
            if (error.reason === "StatusCode") {
              return new CensusApiError({
                message: `Census API returned HTTP ${error.response.status}`,
                status: error.response.status,
                cause: error,
              });
            }
            return new CensusApiError({
              message: "Census API response was not valid JSON",
              status: error.response.status,
              cause: error,
            });
          })
        );

        const body = yield* Schema.decodeUnknown(CensusResponse)(json).pipe(
          Effect.mapError(
            (error) =>
              new CensusParseError({
                message: `Unexpected response shape: ${error.message}`,
                cause: error,
              })
          )
        );

        return yield* splitTable(body);
      });

    return { fetchTable };
  }),
  dependencies: [FetchHttpClient.layer],
}) {}
