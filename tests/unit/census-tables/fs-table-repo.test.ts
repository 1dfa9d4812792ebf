import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  buildWideTables,
  createFsTableRepo,
  parseCsv,
  writeWideTables,
} from '@/modules/census-tables/index.js';

const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'census-tables-'));
};

const maderoCsv = `\uFEFFActividad Economica,A111A_2018,A131A_2018
Sector 11 Agricultura,"1,234.5",C
Sector 21 Minería,N/A,2
Total Ciudad Madero,"1,300",9
`;

describe('parseCsv', () => {
  it('strips the BOM, trims cells and skips empty lines', () => {
    const rows = parseCsv('\uFEFFActividad Economica, A111A_2018\n\nTotal X , 5\n', 'x.csv');

    expect(rows._unsafeUnwrap()).toEqual([
      ['Actividad Economica', 'A111A_2018'],
      ['Total X', '5'],
    ]);
  });

  it('accepts rows of different lengths', () => {
    const rows = parseCsv('Actividad Economica,A111A_2018,A131A_2018\nTotal X,5\n', 'x.csv');

    expect(rows._unsafeUnwrap()[1]).toEqual(['Total X', '5']);
  });

  it('reports an unterminated quote as malformed', () => {
    const result = parseCsv('Actividad Economica,A111A_2018\n"Sector 11,5\n', 'x.csv');

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'MalformedCsv', path: 'x.csv' });
  });
});

describe('fs table repo', () => {
  it('loads and parses a table from disk', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, '28009.csv'), maderoCsv, 'utf8');

    const repo = createFsTableRepo({ rootDir: dir });
    const { table, issues } = (
      await repo.load({ geographyId: '28009', path: '28009.csv' })
    )._unsafeUnwrap();

    expect(issues).toEqual([]);
    expect(table.totalLabel).toBe('Total Ciudad Madero');
    const first = table.observations[0]?.value;
    expect(first?.kind === 'numeric' && first.value.toString()).toBe('1234.5');
  });

  it('applies the per-table blank convention over the repo default', async () => {
    const dir = await makeTempDir();
    await writeFile(
      path.join(dir, '28.csv'),
      'Actividad Economica,A111A_2018\nSector 11 Agricultura,\nTotal Tamaulipas,5\n',
      'utf8'
    );

    const repo = createFsTableRepo({ rootDir: dir, blankMeans: 'not-applicable' });
    const loaded = await repo.load({ geographyId: '28', path: '28.csv', blankMeans: 'confidential' });

    expect(loaded._unsafeUnwrap().table.observations[0]?.value).toEqual({ kind: 'confidential' });
  });

  it('returns NotFound for a missing file', async () => {
    const dir = await makeTempDir();
    const repo = createFsTableRepo({ rootDir: dir });

    const result = await repo.load({ geographyId: '28', path: '28.csv' });

    expect(result._unsafeUnwrapErr().type).toBe('NotFound');
  });

  it('rejects a file without the activity column', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, '28.csv'), 'Sector,A111A_2018\nTotal,5\n', 'utf8');

    const repo = createFsTableRepo({ rootDir: dir });
    const result = await repo.load({ geographyId: '28', path: '28.csv' });

    expect(result._unsafeUnwrapErr().type).toBe('MissingActivityColumn');
  });
});

describe('writeWideTables', () => {
  it('writes one CSV per geography with its checksum row', async () => {
    const dir = await makeTempDir();
    const { tables } = buildWideTables([
      ['Año Censal', 'Entidad', 'Municipio', 'Actividad económica', 'A111A Producción bruta'],
      ['2018', '28 Tamaulipas', '', 'Sector 11 Agricultura', '1,200'],
      ['2018', '28 Tamaulipas', '', 'Total estatal', '1,250'],
    ])._unsafeUnwrap();

    const written = await writeWideTables(tables, path.join(dir, 'tables'));

    expect(written._unsafeUnwrap()).toEqual(['28.csv']);
    const contents = await readFile(path.join(dir, 'tables', '28.csv'), 'utf8');
    expect(contents).toBe(
      'Actividad Economica,A111A_2018\n' +
        'Sector 11 Agricultura,1200\n' +
        'Total Tamaulipas,1250\n' +
        'checksum,1200\n'
    );
  });
});
