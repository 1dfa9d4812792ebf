import type { OutputError } from './errors.js';
import type { PipelineRun } from './types.js';
import type { GeographyHierarchy, GeographyRepoError } from '../../geography/index.js';
import type { Result } from 'neverthrow';

export interface GeographySource {
  load(): Promise<Result<GeographyHierarchy, GeographyRepoError>>;
}

/**
 * Holds the most recent run for the read-only API.
 */
export interface ReportStore {
  save(run: PipelineRun): void;
  latest(): PipelineRun | null;
}

export interface OutputWriter {
  /** Replaces the output directory contents; returns the written paths */
  write(run: PipelineRun): Promise<Result<string[], OutputError>>;
}
