import { err, ok, type Result } from 'neverthrow';

import { parseCell } from '../cells.js';
import { type MissingExportColumnError, type TableIssue } from '../errors.js';
import { classifyRow, columnHeader, compareColumns, parseSector } from '../labels.js';
import {
  ACTIVITY_COLUMN_ALIASES,
  NOT_APPLICABLE,
  isCensusYear,
  isVariableCode,
  type CellValue,
  type CensusTable,
  type CensusYear,
  type ColumnRef,
  type Observation,
  type RawTable,
  type Sector,
  type SectorTotal,
  type VariableCode,
} from '../types.js';

// Column names of the SAIC long export
const YEAR_COLUMN = 'Año Censal';
const ENTITY_COLUMN = 'Entidad';
const MUNICIPALITY_COLUMN = 'Municipio';

const NATIONAL_ENTITY_CODE = '00';

export type WideTableLevel = 'national' | 'state' | 'municipality';

export interface WideTableGeography {
  id: string;
  /** Name without the statistical code prefix, e.g. "Ciudad Madero" */
  name: string;
  /** Source label, e.g. "009 Ciudad Madero" */
  label: string;
  level: WideTableLevel;
  parentId: string | null;
}

export interface WideTable {
  geography: WideTableGeography;
  table: CensusTable;
}

export interface BuildWideTablesOptions {
  /**
   * Entity codes to keep (e.g. ["28"]). The national total is always kept.
   * All entities are kept when omitted.
   */
  entities?: readonly string[];
}

export interface BuiltWideTables {
  tables: WideTable[];
  issues: TableIssue[];
}

interface VariableColumn {
  index: number;
  variable: VariableCode;
}

interface ActivityRow {
  label: string;
  cells: Map<string, CellValue>;
  /** Columns whose cell failed to parse; left out of the table */
  failed: Set<string>;
}

interface GeographyAccumulator {
  geography: WideTableGeography;
  activities: Map<string, ActivityRow>;
}

const splitCode = (label: string): { code: string; name: string } => {
  const match = /^(\d+)\s+(.*)$/.exec(label.trim());
  if (match === null) return { code: label.trim(), name: label.trim() };
  return { code: match[1] ?? '', name: match[2] ?? '' };
};

const describeGeography = (entity: string, municipality: string): WideTableGeography => {
  const state = splitCode(entity);

  if (state.code === NATIONAL_ENTITY_CODE) {
    return { id: state.code, name: state.name, label: entity, level: 'national', parentId: null };
  }

  if (municipality === '') {
    return {
      id: state.code,
      name: state.name,
      label: entity,
      level: 'state',
      parentId: NATIONAL_ENTITY_CODE,
    };
  }

  const mun = splitCode(municipality);
  return {
    id: `${state.code}${mun.code}`,
    name: mun.name,
    label: municipality,
    level: 'municipality',
    parentId: state.code,
  };
};

const totalLabelFor = (geography: WideTableGeography): string =>
  geography.level === 'national' ? 'Total Nacional' : `Total ${geography.name}`;

const findColumn = (header: string[], names: readonly string[]): number =>
  header.findIndex((h) => names.includes(h.trim()));

const missingColumn = (column: string): MissingExportColumnError => ({
  type: 'MissingExportColumn',
  message: `SAIC export has no '${column}' column`,
  column,
});

/**
 * Pivots the SAIC long export (one row per year, geography and activity) into
 * one wide table per geography.
 *
 * A blank value on an existing activity row is withheld (C); an activity with
 * no row at all for a year is absent (N/A).
 */
export const buildWideTables = (
  raw: RawTable,
  options: BuildWideTablesOptions = {}
): Result<BuiltWideTables, MissingExportColumnError> => {
  const [header = [], ...rows] = raw;

  const yearIndex = findColumn(header, [YEAR_COLUMN]);
  if (yearIndex < 0) return err(missingColumn(YEAR_COLUMN));
  const entityIndex = findColumn(header, [ENTITY_COLUMN]);
  if (entityIndex < 0) return err(missingColumn(ENTITY_COLUMN));
  const municipalityIndex = findColumn(header, [MUNICIPALITY_COLUMN]);
  if (municipalityIndex < 0) return err(missingColumn(MUNICIPALITY_COLUMN));
  const activityIndex = findColumn(header, ACTIVITY_COLUMN_ALIASES);
  if (activityIndex < 0) return err(missingColumn(ACTIVITY_COLUMN_ALIASES[1]));

  const identity = new Set([yearIndex, entityIndex, municipalityIndex, activityIndex]);
  const issues: TableIssue[] = [];
  const variableColumns: VariableColumn[] = [];

  header.forEach((text, index) => {
    if (identity.has(index)) return;
    const code = text.trim().split(/\s+/)[0] ?? '';
    if (!isVariableCode(code)) {
      issues.push({
        type: 'InvalidHeader',
        message: `Export column '${text}' does not start with a known variable code`,
        geographyId: '*',
        column: text,
      });
      return;
    }
    variableColumns.push({ index, variable: code });
  });

  const keepEntities = options.entities === undefined ? null : new Set(options.entities);
  const geographies = new Map<string, GeographyAccumulator>();
  const years = new Set<CensusYear>();

  for (const row of rows) {
    const entity = (row[entityIndex] ?? '').trim();
    const municipality = (row[municipalityIndex] ?? '').trim();
    const activity = (row[activityIndex] ?? '').trim();
    const yearText = (row[yearIndex] ?? '').trim();
    if (entity === '' && activity === '') continue;

    const geography = describeGeography(entity, municipality);
    const entityCode = splitCode(entity).code;
    if (
      keepEntities !== null &&
      entityCode !== NATIONAL_ENTITY_CODE &&
      !keepEntities.has(entityCode)
    ) {
      continue;
    }

    const year = Number(yearText);
    if (!isCensusYear(year)) {
      issues.push({
        type: 'ParseError',
        message: `'${yearText}' is not a census year`,
        raw: yearText,
        geographyId: geography.id,
        rowLabel: activity,
        column: YEAR_COLUMN,
      });
      continue;
    }
    years.add(year);

    let acc = geographies.get(geography.id);
    if (acc === undefined) {
      acc = { geography, activities: new Map() };
      geographies.set(geography.id, acc);
    }

    const label = classifyRow(activity) === 'total' ? totalLabelFor(geography) : activity;
    let activityRow = acc.activities.get(label);
    if (activityRow === undefined) {
      activityRow = { label, cells: new Map(), failed: new Set() };
      acc.activities.set(label, activityRow);
    }

    for (const { index, variable } of variableColumns) {
      const key = columnHeader(variable, year);
      if (activityRow.cells.has(key) || activityRow.failed.has(key)) {
        issues.push({
          type: 'DuplicateRow',
          message: `'${label}' appears twice for ${String(year)}; the first row is used`,
          geographyId: geography.id,
          rowLabel: label,
        });
        break;
      }

      const rawCell = row[index] ?? '';
      const parsed = parseCell(rawCell, 'confidential');
      if (parsed.isErr()) {
        issues.push({ ...parsed.error, geographyId: geography.id, rowLabel: label, column: key });
        activityRow.failed.add(key);
        continue;
      }
      activityRow.cells.set(key, parsed.value);
    }
  }

  const columns: ColumnRef[] = [];
  for (const { variable } of variableColumns) {
    for (const year of years) {
      columns.push({ header: columnHeader(variable, year), variable, year });
    }
  }
  columns.sort(compareColumns);

  const tables = [...geographies.values()].map((acc) => ({
    geography: acc.geography,
    table: toCensusTable(acc, columns),
  }));

  return ok({ tables, issues });
};

const toCensusTable = (acc: GeographyAccumulator, columns: ColumnRef[]): CensusTable => {
  const geographyId = acc.geography.id;
  const sectors: Sector[] = [];
  const observations: Observation[] = [];
  const totals: SectorTotal[] = [];
  let totalLabel: string | null = null;

  for (const row of acc.activities.values()) {
    const isTotal = classifyRow(row.label) === 'total';
    const sector = isTotal ? null : parseSector(row.label);
    if (isTotal) totalLabel = row.label;
    if (sector !== null) sectors.push(sector);

    for (const column of columns) {
      if (row.failed.has(column.header)) continue;
      const value = row.cells.get(column.header) ?? NOT_APPLICABLE;
      if (sector === null) {
        totals.push({ geographyId, variable: column.variable, year: column.year, value });
      } else {
        observations.push({
          geographyId,
          sector,
          variable: column.variable,
          year: column.year,
          value,
        });
      }
    }
  }

  return { geographyId, totalLabel, columns, sectors, observations, totals };
};
