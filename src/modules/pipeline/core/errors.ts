/**
 * Pipeline Module - Domain Errors
 *
 * Only problems that leave nothing to compute stop a run: an unusable
 * geography configuration, or no table loaded at all. Everything about the
 * census data itself is reported as findings. Writing the outputs is a
 * separate step with its own `OutputError`.
 */

import type { IoError } from '../../../common/types/errors.js';
import type { GeographyRepoError } from '../../geography/index.js';

export interface NoTablesLoadedError {
  readonly type: 'NoTablesLoaded';
  readonly message: string;
  readonly failed: number;
}

export type PipelineError = GeographyRepoError | NoTablesLoadedError;

export type OutputError = IoError;

export const createNoTablesLoadedError = (failed: number): NoTablesLoadedError => ({
  type: 'NoTablesLoaded',
  message: `None of the ${String(failed)} configured tables could be loaded`,
  failed,
});
