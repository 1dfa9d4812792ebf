import { err, ok, type Result } from 'neverthrow';

import { createGeographyConfigError, type GeographyConfigError } from '../errors.js';

import type {
  GeographyConfigDTO,
  GeographyHierarchy,
  GeographyNode,
  MunicipalityNode,
  NationalNode,
  RegionMemberLevel,
  RegionNode,
  StateNode,
} from '../types.js';

const defaultTable = (id: string): string => `${id}.csv`;

/**
 * Validates the configured geographies and links them into a hierarchy.
 *
 * Checked before any table is loaded: ids are unique across all levels, each
 * municipality belongs to an existing state, and each region lists at least
 * one member, all of the same level, with a parent that contains them.
 */
export const buildGeographyHierarchy = (
  config: GeographyConfigDTO
): Result<GeographyHierarchy, GeographyConfigError> => {
  const violations: string[] = [];
  const nodes = new Map<string, GeographyNode>();

  const register = (node: GeographyNode): boolean => {
    const existing = nodes.get(node.id);
    if (existing !== undefined) {
      violations.push(
        `Id '${node.id}' is used by ${existing.level} '${existing.name}' and ${node.level} '${node.name}'`
      );
      return false;
    }
    nodes.set(node.id, node);
    return true;
  };

  const national: NationalNode = {
    id: config.national.id,
    name: config.national.name,
    level: 'national',
    parentId: null,
    table: config.national.table ?? defaultTable(config.national.id),
  };
  register(national);

  const states: StateNode[] = [];
  for (const entry of config.states) {
    const state: StateNode = {
      id: entry.id,
      name: entry.name,
      level: 'state',
      parentId: national.id,
      table: entry.table ?? defaultTable(entry.id),
    };
    if (register(state)) states.push(state);
  }

  const municipalities: MunicipalityNode[] = [];
  for (const entry of config.municipalities) {
    const parent = nodes.get(entry.state);
    if (parent?.level !== 'state') {
      violations.push(`Municipality '${entry.id}' names unknown state '${entry.state}'`);
      continue;
    }
    const municipality: MunicipalityNode = {
      id: entry.id,
      name: entry.name,
      level: 'municipality',
      parentId: parent.id,
      table: entry.table ?? defaultTable(entry.id),
    };
    if (register(municipality)) municipalities.push(municipality);
  }

  const regions: RegionNode[] = [];
  for (const entry of config.regions) {
    const region = checkRegion(entry, nodes, national.id);
    if (typeof region === 'string') {
      violations.push(region);
      continue;
    }
    if (register(region)) regions.push(region);
  }

  if (violations.length > 0) {
    return err(createGeographyConfigError(violations));
  }

  return ok({ national, states, municipalities, regions, nodes });
};

/**
 * Returns the region node, or the first violation that rules it out.
 */
const checkRegion = (
  entry: GeographyConfigDTO['regions'][number],
  nodes: ReadonlyMap<string, GeographyNode>,
  nationalId: string
): RegionNode | string => {
  if (entry.members.length === 0) {
    return `Region '${entry.id}' has no members`;
  }

  const seen = new Set<string>();
  const levels = new Set<string>();
  const memberNodes: GeographyNode[] = [];

  for (const memberId of entry.members) {
    if (seen.has(memberId)) {
      return `Region '${entry.id}' lists member '${memberId}' more than once`;
    }
    seen.add(memberId);

    const member = nodes.get(memberId);
    if (member === undefined) {
      return `Region '${entry.id}' names unknown member '${memberId}'`;
    }
    levels.add(member.level);
    memberNodes.push(member);
  }

  if (levels.size > 1) {
    return `Region '${entry.id}' mixes members of levels ${[...levels].sort().join(', ')}`;
  }

  const [first] = memberNodes;
  let memberLevel: RegionMemberLevel;
  if (first?.level === 'state') {
    memberLevel = 'state';
    if (entry.parent !== nationalId) {
      return `Region '${entry.id}' groups states, so its parent must be '${nationalId}'`;
    }
  } else if (first?.level === 'municipality') {
    memberLevel = 'municipality';
    const outside = memberNodes.filter((member) => member.parentId !== entry.parent);
    if (outside.length > 0) {
      return `Region '${entry.id}' has members outside its parent state '${entry.parent}': ${outside
        .map((member) => member.id)
        .join(', ')}`;
    }
  } else {
    return `Region '${entry.id}' must group states or municipalities`;
  }

  return {
    id: entry.id,
    name: entry.name,
    level: 'region',
    parentId: entry.parent,
    members: [...entry.members],
    memberLevel,
  };
};
