/**
 * Geography Module
 *
 * National, state, municipality and region nodes, and the fixed membership
 * lists that regions aggregate over.
 */

export {
  GeographyConfigSchema,
  isRegion,
  tabulatedNodes,
  type GeographyConfigDTO,
  type GeographyHierarchy,
  type GeographyLevel,
  type GeographyNode,
  type MunicipalityNode,
  type NationalNode,
  type RegionMemberLevel,
  type RegionNode,
  type StateNode,
  type TabulatedLevel,
  type TabulatedNode,
} from './core/types.js';

export {
  createGeographyConfigError,
  type GeographyConfigError,
  type GeographyRepoError,
} from './core/errors.js';

export { buildGeographyHierarchy } from './core/usecases/build-geography-hierarchy.js';

export { loadGeographyHierarchy, parseGeographyConfig } from './shell/repo/yaml-repo.js';
