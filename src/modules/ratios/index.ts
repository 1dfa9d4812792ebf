/**
 * Ratios Module
 *
 * State/National, Region/State and Region/National proportion matrices,
 * share-of-total matrices and regional aggregate tables.
 */

export {
  DEFAULT_RATIO_VARIABLES,
  RATIO_KINDS,
  isRatioKind,
  type AnomalyRecord,
  type CellLocation,
  type ComputeRatiosOptions,
  type DefinedRatio,
  type KnownOperand,
  type MatrixRow,
  type Operand,
  type RatioAnomaly,
  type RatioCell,
  type RatioComputation,
  type RatioKind,
  type RatioMatrix,
  type ShareMatrix,
  type UndefinedCellRecord,
  type UndefinedRatio,
  type UndefinedReason,
  type UnknownOperand,
  type UnknownValueReason,
  type ValueCause,
  type YearRatioView,
} from './core/types.js';

export { resolveValue, hasData, sectorsOf } from './core/usecases/resolve-value.js';
export { divide } from './core/usecases/divide.js';
export {
  computeRatioMatrices,
  computeRatioMatrix,
  ratioPairs,
  selectYears,
  yearsWithData,
  type RatioPair,
} from './core/usecases/compute-ratio-matrices.js';
export { matrixForYear } from './core/usecases/matrix-for-year.js';
export { computeShareMatrix } from './core/usecases/compute-share-matrix.js';
export { aggregateRegionTable, foldMemberCells } from './core/usecases/aggregate-region-table.js';
