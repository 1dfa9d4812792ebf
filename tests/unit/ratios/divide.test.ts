import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { divide, type Operand } from '@/modules/ratios/index.js';

const known = (geographyId: string, value: string, sectorKey = '11'): Operand => ({
  kind: 'known',
  geographyId,
  sectorKey,
  value: new Decimal(value),
});

const unknown = (
  geographyId: string,
  reason: 'confidential' | 'not-applicable' | 'missing',
  sectorKey = '11'
): Operand => ({
  kind: 'unknown',
  geographyId,
  sectorKey,
  reason,
  cause: { geographyId, sectorKey },
});

describe('divide', () => {
  it('divides two known values', () => {
    const cell = divide(known('28', '1'), known('00', '4'));

    expect(cell.kind).toBe('defined');
    if (cell.kind !== 'defined') return;
    expect(cell.value.toString()).toBe('0.25');
    expect(cell.anomaly).toBeUndefined();
  });

  it('names the unknown numerator first', () => {
    expect(divide(unknown('28', 'confidential'), unknown('00', 'missing'))).toEqual({
      kind: 'undefined',
      reason: 'numerator-confidential',
      cause: { geographyId: '28', sectorKey: '11' },
    });
  });

  it('names an unknown denominator', () => {
    expect(divide(known('28', '1'), unknown('00', 'not-applicable'))).toEqual({
      kind: 'undefined',
      reason: 'denominator-not-applicable',
      cause: { geographyId: '00', sectorKey: '11' },
    });
    expect(divide(known('28', '1'), unknown('00', 'missing')).kind === 'undefined').toBe(true);
  });

  it('leaves division by zero undefined', () => {
    expect(divide(known('28', '1', '21'), known('00', '0', '21'))).toEqual({
      kind: 'undefined',
      reason: 'denominator-zero',
      cause: { geographyId: '00', sectorKey: '21' },
    });
  });

  it('keeps and flags ratios above one', () => {
    const cell = divide(known('28003', '5'), known('28', '4'));

    expect(cell.kind === 'defined' && [cell.value.toString(), cell.anomaly]).toEqual([
      '1.25',
      'above-one',
    ]);
  });

  it('keeps and flags negative ratios', () => {
    const cell = divide(known('28', '-1'), known('00', '4'));

    expect(cell.kind === 'defined' && [cell.value.toString(), cell.anomaly]).toEqual([
      '-0.25',
      'negative',
    ]);
  });

  it('does not flag a ratio of exactly one', () => {
    const cell = divide(known('28', '3'), known('00', '3'));

    expect(cell.kind === 'defined' && cell.anomaly).toBeUndefined();
  });
});
