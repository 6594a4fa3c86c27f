import * as Schema from "effect/Schema";

/**
 * One projected population count, keyed by (year, race, sex, age).
 */
export const PopulationProjection = Schema.Struct({
  year: Schema.Int,
  race: Schema.String,
  sex: Schema.String,
  age: Schema.Int,
  total_pop: Schema.Int,
  last_updated: Schema.String,
});

export type PopulationProjection = Schema.Schema.Type<typeof PopulationProjection>;

/**
 * Resumption state handed to the connector at the start of a run and
 * replaced by the checkpoint at its end.
 */
export const ConnectorState = Schema.Struct({
  last_updated: Schema.optional(Schema.String),
});

export type ConnectorState = Schema.Schema.Type<typeof ConnectorState>;

export type ColumnType = "INT" | "STRING" | "UTC_DATETIME";

export interface TableDefinition {
  readonly table: string;
  readonly primaryKey: readonly string[];
  readonly columns: Readonly<Record<string, ColumnType>>;
}

export type TableRow = Readonly<Record<string, unknown>>;

export const TableRows = Schema.Array(Schema.Record({ key: Schema.String, value: Schema.Unknown }));

export const POPULATION_PROJECTIONS_TABLE: TableDefinition = {
  table: "population_projections",
  primaryKey: ["year", "race", "sex", "age"],
  columns: {
    year: "INT",
    race: "STRING",
    sex: "STRING",
    age: "INT",
    total_pop: "INT",
    last_updated: "UTC_DATETIME",
  },
};

/**
 * Tables the connector delivers.
 */
export const connectorSchema = (): readonly TableDefinition[] => [POPULATION_PROJECTIONS_TABLE];

export const SyncResult = Schema.Struct({
  parameterSets: Schema.Number,
  failedParameterSets: Schema.Number,
  records: Schema.Number,
  duplicateKeys: Schema.Number,
  previousCursor: Schema.String,
  cursor: Schema.String,
  duration: Schema.Number,
});

export type SyncResult = Schema.Schema.Type<typeof SyncResult>;
