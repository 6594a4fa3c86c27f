/**
 * Demographic breakdown codes for one request. Field names match the
 * Census API variables they would filter on.
 */
export interface DemographicParams {
  readonly YEAR: string;
  readonly ORIGIN: string;
  readonly RACE: string;
  readonly SEX: string;
  readonly AGE: string;
}

export const DEMOGRAPHIC_PARAMS: readonly DemographicParams[] = [
  // Hispanic, White, Male, age 0
  { YEAR: "1", ORIGIN: "1", RACE: "1", SEX: "1", AGE: "1" },
  // Hispanic, Black, Male, age 0
  { YEAR: "1", ORIGIN: "1", RACE: "2", SEX: "1", AGE: "1" },
  // Hispanic, AIAN, Male, age 0
  { YEAR: "1", ORIGIN: "1", RACE: "3", SEX: "1", AGE: "1" },
  // Hispanic, Asian, Male, age 0
  { YEAR: "1", ORIGIN: "1", RACE: "4", SEX: "1", AGE: "1" },
  // Hispanic, NHPI, Male, age 0
  { YEAR: "1", ORIGIN: "1", RACE: "5", SEX: "1", AGE: "1" },
  // Hispanic, Two or More Races, Male, age 0
  { YEAR: "1", ORIGIN: "1", RACE: "6", SEX: "1", AGE: "1" },
  // Non-Hispanic, White, Male, age 0
  { YEAR: "1", ORIGIN: "2", RACE: "1", SEX: "1", AGE: "1" },
  // Non-Hispanic, Black, Male, age 0
  { YEAR: "1", ORIGIN: "2", RACE: "2", SEX: "1", AGE: "1" },
];

export const describeParams = (params: DemographicParams): string => JSON.stringify(params);
