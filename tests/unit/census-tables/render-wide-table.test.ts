import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { renderWideTable, sumSectorCells } from '@/modules/census-tables/index.js';

import { makeTable } from '../../fixtures/builders.js';

describe('sumSectorCells', () => {
  it('adds partial sums and counts withheld values', () => {
    const result = sumSectorCells([
      { kind: 'confidential', partial: { sum: new Decimal(5), withheld: 2 } },
      { kind: 'numeric', value: new Decimal(1) },
      { kind: 'confidential' },
      { kind: 'not-applicable' },
    ]);

    expect(result.sum.toString()).toBe('6');
    expect(result.withheld).toBe(3);
    expect(result.hasValues).toBe(true);
  });

  it('marks an empty column', () => {
    expect(sumSectorCells([]).hasValues).toBe(false);
  });
});

describe('renderWideTable', () => {
  it('writes sectors, the Total row last and the checksum row', () => {
    const table = makeTable('28009', ['A111A_2018', 'A131A_2018'], [
      ['Total Ciudad Madero', '15', '9'],
      ['Sector 11 Agricultura', '10.5', 'C'],
      ['Sector 21 Minería', 'N/A', '2'],
      ['Sector 22 Energía', '4.25', 'C'],
    ]);

    expect(renderWideTable(table)).toEqual([
      ['Actividad Economica', 'A111A_2018', 'A131A_2018'],
      ['Sector 11 Agricultura', '10.5', 'C'],
      ['Sector 21 Minería', 'N/A', '2'],
      ['Sector 22 Energía', '4.25', 'C'],
      ['Total Ciudad Madero', '15', '9'],
      ['checksum', '14.75', '2 + 2C'],
    ]);
  });

  it('leaves the checksum empty for a column without sectors', () => {
    const table = makeTable('28', ['A111A_2018'], [['Total Tamaulipas', '5']]);

    expect(renderWideTable(table)).toEqual([
      ['Actividad Economica', 'A111A_2018'],
      ['Total Tamaulipas', '5'],
      ['checksum', ''],
    ]);
  });

  it('renders cells dropped at parse time as empty', () => {
    const table = makeTable('28', ['A111A_2018', 'A131A_2018'], [
      ['Sector 11 Agricultura', 'abc', '1'],
      ['Total Tamaulipas', '5', '1'],
    ]);

    expect(renderWideTable(table)[1]).toEqual(['Sector 11 Agricultura', '', '1']);
  });
});
