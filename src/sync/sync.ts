import { Array as Arr, Clock, Effect, Either } from "effect";
import { CensusService } from "../census/client";
import { type CodeTables, DEFAULT_CODE_TABLES } from "../census/codes";
import { DEMOGRAPHIC_PARAMS, type DemographicParams, describeParams } from "../census/params";
import { parseRow } from "../census/parse";
import { AppConfig } from "../config";
import {
  type ConnectorState,
  POPULATION_PROJECTIONS_TABLE,
  type PopulationProjection,
  type SyncResult,
} from "../core/schema";
import { type DestinationError, DestinationService } from "../destination/local";
import { type StateError, StateService, resolveCursor } from "../state";

export interface PipelineOptions {
  readonly parameterSets: readonly DemographicParams[];
  readonly codeTables: CodeTables;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  parameterSets: DEMOGRAPHIC_PARAMS,
  codeTables: DEFAULT_CODE_TABLES,
};

/**
 * UTC timestamp at second precision, e.g. 2024-05-01T08:30:00Z.
 */
export const formatSyncTimestamp = (millis: number): string =>
  new Date(millis).toISOString().replace(/\.\d{3}Z$/, "Z");

export const naturalKey = (record: PopulationProjection): string =>
  JSON.stringify([record.year, record.race, record.sex, record.age]);

interface ProcessingContext {
  readonly records: number;
  readonly failedParameterSets: number;
  readonly duplicateKeys: number;
  readonly emittedKeys: ReadonlySet<string>;
}

export class SyncService extends Effect.Service<SyncService>()("SyncService", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const censusService = yield* CensusService;
    const destination = yield* DestinationService;
    const stateService = yield* StateService;

    const processParams = (
      params: DemographicParams,
      context: ProcessingContext,
      codeTables: CodeTables,
      lastUpdated: string
    ): Effect.Effect<ProcessingContext, never> =>
      Effect.gen(function* () {
        const emittedKeys = new Set(context.emittedKeys);
        let records = context.records;
        let duplicateKeys = context.duplicateKeys;

        // Rows are emitted as they are converted. A failure stops the set but
        // keeps what was already emitted.
        const outcome = yield* Effect.either(
          Effect.gen(function* () {
            const table = yield* censusService.fetchTable(params);

            yield* Effect.logInfo(
              `Received ${table.rows.length} records for params: ${describeParams(params)}`
            );

            for (const [index, row] of table.rows.entries()) {
              const record = yield* parseRow(table.headers, row, index, codeTables, lastUpdated);
              yield* destination.upsert(POPULATION_PROJECTIONS_TABLE.table, record);
              records++;

              const key = naturalKey(record);
              if (emittedKeys.has(key)) {
                duplicateKeys++;
              } else {
                emittedKeys.add(key);
              }
            }
          })
        );

        let failedParameterSets = context.failedParameterSets;
        if (Either.isLeft(outcome)) {
          failedParameterSets++;
          yield* Effect.logWarning(
            `Error processing data for params ${describeParams(params)}: ${outcome.left.message}`
          );
        }

        return { records, failedParameterSets, duplicateKeys, emittedKeys };
      });

    const update = (
      state: ConnectorState,
      options: PipelineOptions = DEFAULT_PIPELINE_OPTIONS
    ): Effect.Effect<SyncResult, DestinationError> =>
      Effect.gen(function* () {
        const startTime = yield* Clock.currentTimeMillis;
        const lastUpdated = formatSyncTimestamp(startTime);
        const previousCursor = resolveCursor(state);

        yield* Effect.logInfo("Census population projections connector: starting sync");
        yield* Effect.logDebug(`Previous cursor: ${previousCursor}`);

        // The parameter sets do not reach the request unless filters are
        // switched on, so every set fetches the same full table.
        if (!config.census.applyDemographicFilters) {
          yield* Effect.logWarning(
            "Demographic parameter sets are not applied to requests; each set fetches the same unfiltered table (APPLY_DEMOGRAPHIC_FILTERS=true to filter)"
          );
        }

        const initialContext: ProcessingContext = {
          records: 0,
          failedParameterSets: 0,
          duplicateKeys: 0,
          emittedKeys: new Set(),
        };

        const finalContext = yield* Arr.reduce(
          options.parameterSets,
          Effect.succeed(initialContext),
          (acc, params) =>
            Effect.flatMap(acc, (ctx) =>
              processParams(params, ctx, options.codeTables, lastUpdated)
            )
        );

        yield* Effect.logInfo(`Total records processed: ${finalContext.records}`);

        yield* destination.checkpoint({ last_updated: lastUpdated });

        const endTime = yield* Clock.currentTimeMillis;

        return {
          parameterSets: options.parameterSets.length,
          failedParameterSets: finalContext.failedParameterSets,
          records: finalContext.records,
          duplicateKeys: finalContext.duplicateKeys,
          previousCursor,
          cursor: lastUpdated,
          duration: endTime - startTime,
        };
      });

    const run: Effect.Effect<SyncResult, StateError | DestinationError> = Effect.flatMap(
      stateService.load,
      (state) => update(state)
    );

    return { update, run };
  }),
  dependencies: [CensusService.Default, DestinationService.Default, StateService.Default],
}) {}
