export type CodeTable = Readonly<Record<string, string>>;

export interface CodeTables {
  readonly race: CodeTable;
  readonly sex: CodeTable;
}

export const RACE_LABELS: CodeTable = {
  "1": "White",
  "2": "Black",
  "3": "AIAN",
  "4": "Asian",
  "5": "NHPI",
  "6": "Two or More Races",
};

export const SEX_LABELS: CodeTable = {
  "1": "Male",
  "2": "Female",
};

export const DEFAULT_CODE_TABLES: CodeTables = {
  race: RACE_LABELS,
  sex: SEX_LABELS,
};

/**
 * Returns the label for a code, or the code itself when the table has no entry.
 */
export const translateCode = (table: CodeTable, code: string): string =>
  Object.hasOwn(table, code) ? table[code] : code;
