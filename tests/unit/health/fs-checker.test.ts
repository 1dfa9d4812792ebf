import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect } from 'vitest';

import { makeFsHealthChecker } from '@/modules/health/index.js';

const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'health-'));
};

describe('makeFsHealthChecker', () => {
  it('is healthy for a readable directory', async () => {
    const dir = await makeTempDir();

    const result = await makeFsHealthChecker({
      name: 'census-data',
      path: dir,
      expect: 'directory',
    })();

    expect(result.name).toBe('census-data');
    expect(result.status).toBe('healthy');
    expect(result.critical).toBe(true);
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('is unhealthy when the path has the wrong kind', async () => {
    const dir = await makeTempDir();

    const result = await makeFsHealthChecker({
      name: 'geography-config',
      path: dir,
      expect: 'file',
    })();

    expect(result.status).toBe('unhealthy');
    expect(result.message).toBe(`${dir} is not a file`);
  });

  it('is unhealthy when the path does not exist', async () => {
    const dir = await makeTempDir();
    const missing = path.join(dir, 'geography.yaml');

    const result = await makeFsHealthChecker({
      name: 'geography-config',
      path: missing,
      expect: 'file',
    })();

    expect(result.status).toBe('unhealthy');
    expect(result.message).toContain('ENOENT');
  });

  it('keeps the configured critical flag', async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, 'geography.yaml');
    await writeFile(file, 'national: {}\n', 'utf8');

    const result = await makeFsHealthChecker({
      name: 'geography-config',
      path: file,
      expect: 'file',
      critical: false,
    })();

    expect(result.status).toBe('healthy');
    expect(result.critical).toBe(false);
  });
});
