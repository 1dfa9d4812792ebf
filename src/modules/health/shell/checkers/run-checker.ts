/**
 * Pipeline run health checker
 *
 * The API only serves data once a run has completed and been stored.
 */

import type { ReportStore } from '../../../pipeline/index.js';
import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export const makeRunHealthChecker = (
  reportStore: ReportStore,
  name = 'pipeline-run'
): HealthChecker => {
  return async (): Promise<HealthCheckResult> => {
    const run = reportStore.latest();
    if (run === null) {
      return { name, status: 'unhealthy', message: 'No pipeline run is available', critical: true };
    }

    const { tablesLoaded, tablesFailed } = run.report.summary;
    return {
      name,
      status: 'healthy',
      message: `${String(tablesLoaded)} tables loaded, ${String(tablesFailed)} failed`,
      critical: true,
    };
  };
};
