import { Cause, Effect, Layer } from "effect";
import { LoggerLive, debug, error, info } from "./core/logger";
import { POPULATION_PROJECTIONS_TABLE, connectorSchema } from "./core/schema";
import { DestinationService } from "./destination/local";
import { SyncService } from "./sync/sync";

const sync = Effect.gen(function* () {
  info("Census population projections sync starting...");
  debug("Declared schema", { tables: connectorSchema() });

  const syncService = yield* SyncService;
  const destination = yield* DestinationService;

  const result = yield* syncService.run;
  const rows = yield* destination.snapshot(POPULATION_PROJECTIONS_TABLE.table);

  info("Sync complete", {
    records: result.records,
    failedParameterSets: `${result.failedParameterSets}/${result.parameterSets}`,
    duplicateKeys: result.duplicateKeys,
    previousCursor: result.previousCursor,
    cursor: result.cursor,
    tableRows: rows.length,
    duration: `${result.duration}ms`,
  });
});

/**
 * One sync against the local destination. Failures while building the
 * services (missing configuration) are logged the same way as run failures.
 */
export const program = sync.pipe(
  Effect.provide(Layer.mergeAll(SyncService.Default, DestinationService.Default)),
  Effect.tapErrorCause((cause) =>
    Cause.isInterruptedOnly(cause)
      ? Effect.void
      : Effect.sync(() => {
          error("Fatal error", { message: Cause.pretty(cause) });
        })
  ),
  Effect.provide(LoggerLive)
);
