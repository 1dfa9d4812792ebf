import type { ReportStore } from '../../core/ports.js';
import type { PipelineRun } from '../../core/types.js';

/**
 * Keeps the last run in process memory. The API serves from it; a new run
 * replaces it as a whole.
 */
export const makeMemoryReportStore = (initial: PipelineRun | null = null): ReportStore => {
  let current = initial;

  return {
    save(run) {
      current = run;
    },
    latest: () => current,
  };
};
