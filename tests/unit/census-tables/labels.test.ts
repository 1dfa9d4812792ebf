import { describe, expect, it } from 'vitest';

import {
  classifyRow,
  compareColumns,
  parseColumnHeader,
  parseSector,
} from '@/modules/census-tables/index.js';

describe('parseColumnHeader', () => {
  it('splits a variable and census year', () => {
    expect(parseColumnHeader(' A131A_2018 ')._unsafeUnwrap()).toEqual({
      header: 'A131A_2018',
      variable: 'A131A',
      year: 2018,
    });
  });

  it('rejects an unknown variable code', () => {
    expect(parseColumnHeader('A999Z_2018')._unsafeUnwrapErr()).toBe(
      "Column 'A999Z_2018' names unknown variable code 'A999Z'"
    );
  });

  it('rejects a year without a census', () => {
    expect(parseColumnHeader('A111A_2019')._unsafeUnwrapErr()).toBe(
      "Column 'A111A_2019' names 2019, which is not a census year"
    );
  });

  it('rejects headers outside the naming convention', () => {
    expect(parseColumnHeader('Total')._unsafeUnwrapErr()).toBe(
      "Column 'Total' does not follow the VariableCode_Year convention"
    );
  });
});

describe('parseSector', () => {
  it('keys sectors by their code', () => {
    expect(parseSector('Sector 21 Minería')).toEqual({
      key: '21',
      code: '21',
      label: 'Sector 21 Minería',
    });
    expect(parseSector('Sector 31-33 Industrias manufactureras').key).toBe('31-33');
  });

  it('falls back to the label when there is no code', () => {
    expect(parseSector(' Otros servicios ')).toEqual({
      key: 'Otros servicios',
      code: null,
      label: 'Otros servicios',
    });
  });
});

describe('classifyRow', () => {
  it('tells total, checksum and sector rows apart', () => {
    expect(classifyRow('Total Ciudad Madero')).toBe('total');
    expect(classifyRow('TOTAL')).toBe('total');
    expect(classifyRow('checksum')).toBe('checksum');
    expect(classifyRow('Sector 11 Agricultura')).toBe('sector');
    expect(classifyRow('Totalizadores')).toBe('sector');
  });
});

describe('compareColumns', () => {
  it('orders by variable, then year', () => {
    const columns = [
      { header: 'A131A_2023', variable: 'A131A', year: 2023 },
      { header: 'A111A_2023', variable: 'A111A', year: 2023 },
      { header: 'A131A_2003', variable: 'A131A', year: 2003 },
      { header: 'A111A_2018', variable: 'A111A', year: 2018 },
    ] as const;

    expect([...columns].sort(compareColumns).map((column) => column.header)).toEqual([
      'A111A_2018',
      'A111A_2023',
      'A131A_2003',
      'A131A_2023',
    ]);
  });
});
