import { Decimal } from 'decimal.js';

import {
  TOTAL_ROW_KEY,
  type CensusYear,
  type ObservationIndex,
  type VariableCode,
} from '../../../census-tables/index.js';

import type { Operand, UnknownValueReason } from '../types.js';
import type { GeographyHierarchy } from '../../../geography/index.js';

const unknown = (
  geographyId: string,
  sectorKey: string,
  reason: UnknownValueReason
): Operand => ({
  kind: 'unknown',
  geographyId,
  sectorKey,
  reason,
  cause: { geographyId, sectorKey },
});

/**
 * Value of one row of one geography. The "Total" row reads the reported
 * total; a region sums its members and is unknown as soon as one member is.
 */
export const resolveValue = (
  index: ObservationIndex,
  hierarchy: GeographyHierarchy,
  geographyId: string,
  rowKey: string,
  variable: VariableCode,
  year: CensusYear
): Operand => {
  const node = hierarchy.nodes.get(geographyId);
  if (node === undefined) {
    return unknown(geographyId, rowKey, 'missing');
  }

  if (node.level !== 'region') {
    const cell =
      rowKey === TOTAL_ROW_KEY
        ? index.total(geographyId, variable, year)
        : index.observation(geographyId, rowKey, variable, year);

    if (cell === undefined) return unknown(geographyId, rowKey, 'missing');
    if (cell.kind === 'confidential') return unknown(geographyId, rowKey, 'confidential');
    if (cell.kind === 'not-applicable') return unknown(geographyId, rowKey, 'not-applicable');
    return { kind: 'known', geographyId, sectorKey: rowKey, value: cell.value };
  }

  let sum = new Decimal(0);
  for (const memberId of node.members) {
    const member = resolveValue(index, hierarchy, memberId, rowKey, variable, year);
    if (member.kind === 'unknown') {
      return {
        kind: 'unknown',
        geographyId,
        sectorKey: rowKey,
        reason: member.reason,
        cause: { ...member.cause, regionId: member.cause.regionId ?? geographyId },
      };
    }
    sum = sum.plus(member.value);
  }

  return { kind: 'known', geographyId, sectorKey: rowKey, value: sum };
};

/**
 * Whether any table backs the geography (for a region: any of its members).
 */
export const hasData = (
  index: ObservationIndex,
  hierarchy: GeographyHierarchy,
  geographyId: string
): boolean => {
  const node = hierarchy.nodes.get(geographyId);
  if (node === undefined) return false;
  if (node.level !== 'region') return index.hasGeography(geographyId);
  return node.members.some((memberId) => hasData(index, hierarchy, memberId));
};

/**
 * Sectors of a geography in table order; for a region, the union over its
 * members in member order.
 */
export const sectorsOf = (
  index: ObservationIndex,
  hierarchy: GeographyHierarchy,
  geographyId: string
): { sectorKey: string; label: string }[] => {
  const node = hierarchy.nodes.get(geographyId);
  if (node === undefined) return [];
  if (node.level !== 'region') {
    return index.sectorsOf(geographyId).map((sector) => ({
      sectorKey: sector.key,
      label: sector.label,
    }));
  }

  const seen = new Map<string, string>();
  for (const memberId of node.members) {
    for (const sector of sectorsOf(index, hierarchy, memberId)) {
      if (!seen.has(sector.sectorKey)) seen.set(sector.sectorKey, sector.label);
    }
  }
  return [...seen].map(([sectorKey, label]) => ({ sectorKey, label }));
};
