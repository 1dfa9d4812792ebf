import { mkdir, mkdtemp, readFile, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createFsOutputWriter, planOutputFiles } from '@/modules/pipeline/index.js';

import { makeTestRun } from '../../fixtures/fakes.js';

const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'census-output-'));
};

const contentsOf = (files: { relativePath: string; contents: string }[], relativePath: string) =>
  files.find((file) => file.relativePath === relativePath)?.contents;

describe('planOutputFiles', () => {
  it('lays out matrices, year views, shares, region tables and reports', async () => {
    const files = planOutputFiles(await makeTestRun(), 6);
    const paths = files.map((file) => file.relativePath);

    expect(files).toHaveLength(31);
    expect(paths.slice(0, 4)).toEqual([
      'ratios/state-national/A131A/19__00.csv',
      'ratios/state-national/A131A/by-year/2018.csv',
      'ratios/state-national/A131A/by-year/2023.csv',
      'ratios/state-national/A131A/28__00.csv',
    ]);
    expect(paths).toContain('ratios/region-state/A131A/sur__28.csv');
    expect(paths).toContain('shares/norte/A131A_percent.csv');
    expect(paths).toContain('regions/noreste.csv');
    expect(paths.slice(-6)).toEqual([
      'report/checksum-findings.csv',
      'report/undefined-ratios.csv',
      'report/ratio-anomalies.csv',
      'report/parse-issues.csv',
      'report/table-load-failures.csv',
      'report/summary.json',
    ]);
  });

  it('writes undefined ratios as ND', async () => {
    const files = planOutputFiles(await makeTestRun(), 6);

    expect(contentsOf(files, 'ratios/state-national/A131A/28__00.csv')).toBe(
      'Actividad Economica,A131A_2018,A131A_2023\n' +
        'Sector 11 Agricultura,0.100000,0.125000\n' +
        'Sector 21 Minería,ND,0.100000\n' +
        'Total,0.200000,0.116667\n'
    );
  });

  it('writes one row per numerator in the year views', async () => {
    const files = planOutputFiles(await makeTestRun(), 6);

    expect(contentsOf(files, 'ratios/state-national/A131A/by-year/2018.csv')).toBe(
      'geography_id,geography,Sector 11 Agricultura,Sector 21 Minería,Total\n' +
        '19,Nuevo León,0.050000,0.040000,0.046667\n' +
        '28,Tamaulipas,0.100000,ND,0.200000\n'
    );
  });

  it('writes shares as percentages with two decimals', async () => {
    const files = planOutputFiles(await makeTestRun(), 6);

    expect(contentsOf(files, 'shares/28/A131A_percent.csv')).toBe(
      'Actividad Economica,A131A_2018,A131A_2023\n' +
        'Sector 11 Agricultura,33.33,71.43\n' +
        'Sector 21 Minería,ND,28.57\n' +
        'Total,100.00,100.00\n'
    );
  });

  it('lists discrepancies with their withheld sectors', async () => {
    const files = planOutputFiles(await makeTestRun(), 6);
    const lines = contentsOf(files, 'report/checksum-findings.csv')?.split('\n') ?? [];

    expect(lines[0]).toBe(
      'geography_id,variable,year,status,checksum,reported_total,delta,allowed,reason,confidential_sectors'
    );
    expect(lines).toContain('28,A131A,2018,discrepancy,100,300,200,0.002,,21');
    expect(lines).toContain('00,A131A,2018,consistent,1500,1500,,,,');
  });

  it('lists undefined ratios with the cell that caused them', async () => {
    const files = planOutputFiles(await makeTestRun(), 6);
    const lines = contentsOf(files, 'report/undefined-ratios.csv')?.split('\n') ?? [];

    expect(lines).toContain(
      'A131A,region/national,noreste,00,2018,21,numerator-confidential,28,21,noreste'
    );
  });
});

describe('fs output writer', () => {
  it('replaces the previous contents of the output directory', async () => {
    const dir = await makeTempDir();
    const outputDir = path.join(dir, 'output');
    await mkdir(outputDir, { recursive: true });
    await writeFile(path.join(outputDir, 'stale.csv'), 'old', 'utf8');

    const writer = createFsOutputWriter({ outputDir, ratioDecimals: 6 });
    const written = (await writer.write(await makeTestRun()))._unsafeUnwrap();

    expect(written).toHaveLength(31);
    await expect(stat(path.join(outputDir, 'stale.csv'))).rejects.toThrow();
    const summary: unknown = JSON.parse(
      await readFile(path.join(outputDir, 'report', 'summary.json'), 'utf8')
    );
    expect(summary).toMatchObject({ tablesLoaded: 6, ratioMatrices: 7 });
  });
});
