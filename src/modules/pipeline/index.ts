/**
 * Pipeline Module
 *
 * Loader → checksum validator → ratio engine, the files a run writes and the
 * read-only API over the last run.
 */

// Types
export type {
  PipelineInput,
  PipelineReport,
  PipelineRun,
  PipelineSummary,
  TableLoadFailure,
} from './core/types.js';

// Errors
export {
  createNoTablesLoadedError,
  type NoTablesLoadedError,
  type OutputError,
  type PipelineError,
} from './core/errors.js';

// Ports
export type { GeographySource, OutputWriter, ReportStore } from './core/ports.js';

// Use cases
export { runPipeline, type RunPipelineDeps } from './core/usecases/run-pipeline.js';

// Shell
export { makeMemoryReportStore } from './shell/store/memory-report-store.js';
export {
  createFsOutputWriter,
  planOutputFiles,
  type FsOutputWriterOptions,
} from './shell/writer/fs-output-writer.js';
export {
  UNDEFINED_MARKER,
  checksumFindingRows,
  formatRatioCell,
  kindSlug,
} from './shell/writer/format.js';
export { makePipelineRoutes, type MakePipelineRoutesDeps } from './shell/rest/routes.js';
export { toFindingDTO } from './shell/rest/dto.js';
