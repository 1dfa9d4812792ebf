import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createCellParseError, type CellParseError } from './errors.js';
import {
  CONFIDENTIAL,
  NOT_APPLICABLE,
  numeric,
  type BlankCellMeaning,
  type CellValue,
} from './types.js';

const NUMBER_RE = /^[+-]?((\d{1,3}(,\d{3})+|\d+)(\.\d+)?|\.\d+)$/;
// "123.45 + C", "123.45 + 2C", "2C"; older files write n for C ("12 + n", "2n")
const ANNOTATED_RE = /^(?:([+-]?[\d,]*\.?\d+)\s*\+\s*)?(\d*)\s*([cC]|n)$/;

const toDecimal = (text: string): Decimal => new Decimal(text.replace(/,/g, ''));

/**
 * Reads one census cell into the normalized value domain.
 *
 * Blank cells follow `blankMeans`; the agency files mark absence and
 * confidentiality inconsistently, so the caller chooses per table.
 */
export const parseCell = (
  raw: string,
  blankMeans: BlankCellMeaning = 'not-applicable'
): Result<CellValue, CellParseError> => {
  const text = raw.trim();

  if (text === '') {
    return ok(blankMeans === 'confidential' ? CONFIDENTIAL : NOT_APPLICABLE);
  }

  const upper = text.toUpperCase();
  if (upper === 'N/A') return ok(NOT_APPLICABLE);
  if (upper === 'C') return ok(CONFIDENTIAL);

  if (NUMBER_RE.test(text)) {
    return ok(numeric(toDecimal(text)));
  }

  const annotated = ANNOTATED_RE.exec(text);
  if (annotated !== null) {
    const [, base, coefficient, marker] = annotated;
    if (base !== undefined && !NUMBER_RE.test(base)) {
      return err(createCellParseError(raw));
    }
    // a lone "n" is not a marker
    if (marker === 'n' && base === undefined && coefficient === '') {
      return err(createCellParseError(raw));
    }
    const withheld = coefficient === undefined || coefficient === '' ? 1 : Number(coefficient);
    if (withheld === 0) {
      return err(createCellParseError(raw));
    }
    return ok({
      kind: 'confidential',
      partial: { sum: base === undefined ? new Decimal(0) : toDecimal(base), withheld },
    });
  }

  return err(createCellParseError(raw));
};

/**
 * Formats a decimal with at most `decimals` places, trailing zeros trimmed.
 */
export const formatTrimmed = (value: Decimal, decimals = 3): string => {
  const fixed = value.toFixed(decimals);
  if (!fixed.includes('.')) return fixed;
  const trimmed = fixed.replace(/0+$/, '').replace(/\.$/, '');
  return trimmed === '-0' ? '0' : trimmed;
};

/**
 * Formats a partial sum with its withheld count: "12.5", "12.5 + C", "12.5 + 3C".
 */
export const formatPartialSum = (sum: Decimal, withheld: number): string => {
  const base = formatTrimmed(sum);
  if (withheld <= 0) return base;
  if (withheld === 1) return `${base} + C`;
  return `${base} + ${String(withheld)}C`;
};

/**
 * Renders a cell back to the marker convention of the source files.
 */
export const formatCell = (cell: CellValue): string => {
  switch (cell.kind) {
    case 'numeric':
      return formatTrimmed(cell.value);
    case 'not-applicable':
      return 'N/A';
    case 'confidential':
      return cell.partial === undefined
        ? 'C'
        : formatPartialSum(cell.partial.sum, cell.partial.withheld);
  }
};
