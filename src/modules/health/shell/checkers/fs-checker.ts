/**
 * File-system health checker
 *
 * Verifies that an input the pipeline reads (the census data directory, the
 * geography configuration) exists, has the expected kind and is readable.
 */

import fs from 'node:fs/promises';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export interface FsHealthCheckerOptions {
  /** Name to identify this input in health check results */
  name: string;
  path: string;
  expect: 'file' | 'directory';
  /** Whether a failure makes the service unhealthy (default: true) */
  critical?: boolean;
}

/**
 * @example
 * ```typescript
 * const dataChecker = makeFsHealthChecker({ name: 'census-data', path: './data/tables', expect: 'directory' });
 * const result = await dataChecker();
 * // { name: 'census-data', status: 'healthy', latencyMs: 1, critical: true }
 * ```
 */
export const makeFsHealthChecker = (options: FsHealthCheckerOptions): HealthChecker => {
  const { name, path, expect, critical = true } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();

    try {
      const stats = await fs.stat(path);
      const matches = expect === 'file' ? stats.isFile() : stats.isDirectory();
      if (!matches) {
        return {
          name,
          status: 'unhealthy',
          message: `${path} is not a ${expect}`,
          latencyMs: Date.now() - startTime,
          critical,
        };
      }

      await fs.access(path, fs.constants.R_OK);

      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown file-system error',
        latencyMs: Date.now() - startTime,
        critical,
      };
    }
  };
};
