import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { toIoError } from '../../../../common/types/errors.js';
import { formatSchemaErrors, type GeographyRepoError } from '../../core/errors.js';
import {
  GeographyConfigSchema,
  type GeographyConfigDTO,
  type GeographyHierarchy,
} from '../../core/types.js';
import { buildGeographyHierarchy } from '../../core/usecases/build-geography-hierarchy.js';

const validator = TypeCompiler.Compile(GeographyConfigSchema);

/**
 * Parses and schema-checks geography YAML text.
 */
export const parseGeographyConfig = (
  contents: string,
  source: string
): Result<GeographyConfigDTO, GeographyRepoError> => {
  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${source}: ${(error as Error).message}`,
      path: source,
    });
  }

  // Fills the empty municipality and region lists
  const withDefaults = Value.Default(GeographyConfigSchema, parsed);

  if (!validator.Check(withDefaults)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${source}`,
      details: formatSchemaErrors(validator.Errors(withDefaults)),
    });
  }

  return ok(withDefaults);
};

/**
 * Reads the geography configuration file and builds the hierarchy.
 */
export const loadGeographyHierarchy = async (
  filePath: string
): Promise<Result<GeographyHierarchy, GeographyRepoError>> => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err(toIoError(error, filePath, 'read'));
  }

  const config = parseGeographyConfig(contents, filePath);
  if (config.isErr()) {
    return err(config.error);
  }

  return buildGeographyHierarchy(config.value);
};
