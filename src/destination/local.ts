import * as NodePath from "node:path";
import { Data, Effect, Ref, Schema } from "effect";
import { AppConfig } from "../config";
import { readFileIfExists, writeJsonFile } from "../core/files";
import {
  type ConnectorState,
  type TableDefinition,
  type TableRow,
  TableRows,
  connectorSchema,
} from "../core/schema";
import { StateService } from "../state";

export class DestinationError extends Data.TaggedError("DestinationError")<{
  readonly message: string;
  readonly table?: string;
  readonly cause?: unknown;
}> {}

const TABLES_DIR = "tables";

const decodeTableRows = Schema.decodeUnknown(Schema.parseJson(TableRows));

/**
 * Identity of a row within its table: the primary-key values in declared order.
 */
export const primaryKeyOf = (
  definition: TableDefinition,
  row: TableRow
): Effect.Effect<string, DestinationError> => {
  const missing = definition.primaryKey.filter((column) => row[column] === undefined);
  if (missing.length > 0) {
    return Effect.fail(
      new DestinationError({
        message: `Row for ${definition.table} is missing primary key columns: ${missing.join(", ")}`,
        table: definition.table,
      })
    );
  }
  return Effect.succeed(JSON.stringify(definition.primaryKey.map((column) => row[column])));
};

/**
 * Local stand-in for the sync platform. Upserts are buffered until the next
 * checkpoint, which merges them into one JSON file per table and then saves
 * the connector state.
 */
export class DestinationService extends Effect.Service<DestinationService>()(
  "DestinationService",
  {
    effect: Effect.gen(function* () {
      const config = yield* AppConfig;
      const stateService = yield* StateService;
      const definitions = new Map(connectorSchema().map((d) => [d.table, d] as const));
      const pending = yield* Ref.make(new Map<string, Map<string, TableRow>>());

      const tablePath = (table: string) =>
        NodePath.join(config.storage.dataDir, TABLES_DIR, `${table}.json`);

      const lookupTable = (table: string): Effect.Effect<TableDefinition, DestinationError> => {
        const definition = definitions.get(table);
        return definition
          ? Effect.succeed(definition)
          : Effect.fail(new DestinationError({ message: `Unknown table: ${table}`, table }));
      };

      const readTable = (definition: TableDefinition) =>
        Effect.gen(function* () {
          const path = tablePath(definition.table);
          const content = yield* Effect.tryPromise({
            try: () => readFileIfExists(path),
            catch: (error) =>
              new DestinationError({
                message: error instanceof Error ? error.message : `Failed to read ${path}`,
                table: definition.table,
                cause: error,
              }),
          });
          if (content === undefined) {
            return new Map<string, TableRow>();
          }
          const rows = yield* decodeTableRows(content).pipe(
            Effect.mapError(
              (error) =>
                new DestinationError({
                  message: `Invalid table file ${path}: ${error.message}`,
                  table: definition.table,
                  cause: error,
                })
            )
          );
          const keyed = new Map<string, TableRow>();
          for (const row of rows) {
            keyed.set(yield* primaryKeyOf(definition, row), row);
          }
          return keyed;
        });

      const mergeTable = (definition: TableDefinition, updates: ReadonlyMap<string, TableRow>) =>
        Effect.map(readTable(definition), (current) => {
          for (const [key, row] of updates) {
            current.set(key, row);
          }
          return current;
        });

      const upsert = (table: string, row: TableRow): Effect.Effect<void, DestinationError> =>
        Effect.gen(function* () {
          const definition = yield* lookupTable(table);
          const key = yield* primaryKeyOf(definition, row);
          yield* Ref.update(pending, (tables) => {
            const next = new Map(tables);
            const rows = new Map(next.get(table));
            rows.set(key, row);
            next.set(table, rows);
            return next;
          });
        });

      const checkpoint = (state: ConnectorState): Effect.Effect<void, DestinationError> =>
        Effect.gen(function* () {
          const buffered = yield* Ref.getAndSet(pending, new Map<string, Map<string, TableRow>>());

          for (const [table, updates] of buffered) {
            const definition = yield* lookupTable(table);
            const merged = yield* mergeTable(definition, updates);
            const path = tablePath(table);
            yield* Effect.tryPromise({
              try: () => writeJsonFile(path, Array.from(merged.values())),
              catch: (error) =>
                new DestinationError({
                  message: error instanceof Error ? error.message : `Failed to write ${path}`,
                  table,
                  cause: error,
                }),
            });
            yield* Effect.logDebug(`Wrote ${merged.size} rows to ${path}`);
          }

          yield* stateService.save(state).pipe(
            Effect.mapError(
              (error) =>
                new DestinationError({
                  message: `Failed to save checkpoint: ${error.message}`,
                  cause: error,
                })
            )
          );
          yield* Effect.logInfo(`Checkpoint saved: ${JSON.stringify(state)}`);
        });

      const snapshot = (table: string): Effect.Effect<TableRow[], DestinationError> =>
        Effect.gen(function* () {
          const definition = yield* lookupTable(table);
          const buffered = yield* Ref.get(pending);
          const merged = yield* mergeTable(definition, buffered.get(table) ?? new Map<string, TableRow>());
          return Array.from(merged.values());
        });

      return { upsert, checkpoint, snapshot };
    }),
    dependencies: [StateService.Default],
  }
) {}
