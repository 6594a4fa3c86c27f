import { Either, Schema } from "effect";
import { PopulationProjection } from "../core/schema";
import { type CensusCell, CensusParseError } from "./client";
import { type CodeTable, type CodeTables, translateCode } from "./codes";

const INTEGER_PATTERN = /^[+-]?\d+$/;

const decodeProjection = Schema.decodeUnknownEither(PopulationProjection);

/**
 * Missing cells count as 0. Anything that is not an integer becomes NaN and
 * is rejected when the record is decoded.
 */
const toInteger = (value: CensusCell | undefined): number => {
  if (value === undefined) return 0;
  if (typeof value === "number") return value;
  if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return Number.NaN;
};

const toLabel = (value: CensusCell | undefined, table: CodeTable): string | null => {
  if (value === undefined) return "";
  if (value === null) return null;
  return translateCode(table, String(value));
};

/**
 * Pairs header names with cell values. Extra cells on either side are dropped.
 */
export const zipRow = (
  headers: readonly string[],
  row: readonly CensusCell[]
): ReadonlyMap<string, CensusCell> => {
  const fields = new Map<string, CensusCell>();
  const width = Math.min(headers.length, row.length);
  for (let i = 0; i < width; i++) {
    fields.set(headers[i], row[i]);
  }
  return fields;
};

export const toProjectionRecord = (
  headers: readonly string[],
  row: readonly CensusCell[],
  codeTables: CodeTables,
  lastUpdated: string
): Either.Either<PopulationProjection, string> => {
  const fields = zipRow(headers, row);

  return decodeProjection({
    year: toInteger(fields.get("YEAR")),
    race: toLabel(fields.get("RACE"), codeTables.race),
    sex: toLabel(fields.get("SEX"), codeTables.sex),
    age: toInteger(fields.get("AGE")),
    total_pop: toInteger(fields.get("POP")),
    last_updated: lastUpdated,
  }).pipe(Either.mapLeft((error) => error.message));
};

/**
 * Converts one data row. `index` is zero-based and reported one-based.
 */
export const parseRow = (
  headers: readonly string[],
  row: readonly CensusCell[],
  index: number,
  codeTables: CodeTables,
  lastUpdated: string
): Either.Either<PopulationProjection, CensusParseError> =>
  toProjectionRecord(headers, row, codeTables, lastUpdated).pipe(
    Either.mapLeft((message) => new CensusParseError({ message: `Row ${index + 1}: ${message}` }))
  );
