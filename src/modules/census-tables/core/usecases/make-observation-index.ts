import type {
  CellValue,
  CensusTable,
  CensusYear,
  Observation,
  Sector,
  VariableCode,
} from '../types.js';

/**
 * Read-only lookup over loaded tables, keyed by
 * (geography, sector, variable, year).
 */
export interface ObservationIndex {
  geographyIds(): string[];
  hasGeography(geographyId: string): boolean;
  table(geographyId: string): CensusTable | undefined;
  sectorsOf(geographyId: string): Sector[];
  observation(
    geographyId: string,
    sectorKey: string,
    variable: VariableCode,
    year: CensusYear
  ): CellValue | undefined;
  total(geographyId: string, variable: VariableCode, year: CensusYear): CellValue | undefined;
  /** Sector observations of one column, in table order */
  column(geographyId: string, variable: VariableCode, year: CensusYear): Observation[];
}

const cellKey = (...parts: (string | number)[]): string => parts.join('|');

export const makeObservationIndex = (tables: readonly CensusTable[]): ObservationIndex => {
  const byGeography = new Map<string, CensusTable>();
  const cells = new Map<string, CellValue>();
  const totals = new Map<string, CellValue>();
  const columns = new Map<string, Observation[]>();

  for (const table of tables) {
    if (byGeography.has(table.geographyId)) continue;
    byGeography.set(table.geographyId, table);

    for (const obs of table.observations) {
      cells.set(cellKey(obs.geographyId, obs.sector.key, obs.variable, obs.year), obs.value);

      const key = cellKey(obs.geographyId, obs.variable, obs.year);
      const existing = columns.get(key);
      if (existing === undefined) {
        columns.set(key, [obs]);
      } else {
        existing.push(obs);
      }
    }

    for (const total of table.totals) {
      totals.set(cellKey(total.geographyId, total.variable, total.year), total.value);
    }
  }

  return {
    geographyIds: () => [...byGeography.keys()],
    hasGeography: (geographyId) => byGeography.has(geographyId),
    table: (geographyId) => byGeography.get(geographyId),
    sectorsOf: (geographyId) => byGeography.get(geographyId)?.sectors ?? [],
    observation: (geographyId, sectorKey, variable, year) =>
      cells.get(cellKey(geographyId, sectorKey, variable, year)),
    total: (geographyId, variable, year) => totals.get(cellKey(geographyId, variable, year)),
    column: (geographyId, variable, year) =>
      columns.get(cellKey(geographyId, variable, year)) ?? [],
  };
};
