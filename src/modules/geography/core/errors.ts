import type { IoError } from '../../../common/types/errors.js';
import type { ValueError } from '@sinclair/typebox/errors';

/**
 * The configuration parsed but describes an invalid hierarchy.
 * Every violation found is listed, not only the first.
 */
export interface GeographyConfigError {
  readonly type: 'GeographyConfigError';
  readonly message: string;
  readonly violations: string[];
}

export type GeographyRepoError =
  | IoError
  | { readonly type: 'ParseError'; readonly message: string; readonly path: string }
  | { readonly type: 'SchemaValidationError'; readonly message: string; readonly details: string[] }
  | GeographyConfigError;

export const createGeographyConfigError = (violations: string[]): GeographyConfigError => ({
  type: 'GeographyConfigError',
  message: `Invalid geography configuration (${String(violations.length)} problem${
    violations.length === 1 ? '' : 's'
  })`,
  violations,
});

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
