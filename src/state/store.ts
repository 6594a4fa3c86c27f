import * as NodePath from "node:path";
import { Data, Effect, Schema } from "effect";
import { AppConfig } from "../config";
import { readFileIfExists, writeJsonFile } from "../core/files";
import { ConnectorState } from "../core/schema";

export const STATE_FILE_NAME = "state.json";

/**
 * Cursor reported when no run has checkpointed yet.
 */
export const DEFAULT_CURSOR = "2000-01-01T00:00:00Z";

export class StateError extends Data.TaggedError("StateError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export const resolveCursor = (state: ConnectorState): string =>
  state.last_updated ?? DEFAULT_CURSOR;

const decodeState = Schema.decodeUnknown(Schema.parseJson(ConnectorState));

export class StateService extends Effect.Service<StateService>()("StateService", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const statePath = NodePath.join(config.storage.dataDir, STATE_FILE_NAME);

    const load: Effect.Effect<ConnectorState, StateError> = Effect.gen(function* () {
      const content = yield* Effect.tryPromise({
        try: () => readFileIfExists(statePath),
        catch: (error) =>
          new StateError({
            message: error instanceof Error ? error.message : "Failed to read state file",
            cause: error,
          }),
      });

      if (content === undefined) {
        return {};
      }

      return yield* decodeState(content).pipe(
        Effect.mapError(
          (error) =>
            new StateError({
              message: `Invalid state file ${statePath}: ${error.message}`,
              cause: error,
            })
        )
      );
    });

    const save = (state: ConnectorState): Effect.Effect<void, StateError> =>
      Effect.tryPromise({
        try: () => writeJsonFile(statePath, state),
        catch: (error) =>
          new StateError({
            message: error instanceof Error ? error.message : "Failed to write state file",
            cause: error,
          }),
      });

    return { load, save };
  }),
  dependencies: [],
}) {}
