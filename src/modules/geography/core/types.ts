import { type Static, Type } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration file schema
// ─────────────────────────────────────────────────────────────────────────────

const TableRefSchema = Type.Optional(
  Type.String({ minLength: 1, description: 'Table file relative to DATA_DIR; defaults to <id>.csv' })
);

const NationalSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  table: TableRefSchema,
});

const StateSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  table: TableRefSchema,
});

const MunicipalitySchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  state: Type.String({ minLength: 1 }),
  table: TableRefSchema,
});

const RegionSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  parent: Type.String({ minLength: 1 }),
  members: Type.Array(Type.String({ minLength: 1 })),
});

export const GeographyConfigSchema = Type.Object({
  national: NationalSchema,
  states: Type.Array(StateSchema),
  municipalities: Type.Array(MunicipalitySchema, { default: [] }),
  regions: Type.Array(RegionSchema, { default: [] }),
});

export type GeographyConfigDTO = Static<typeof GeographyConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Hierarchy
// ─────────────────────────────────────────────────────────────────────────────

export type GeographyLevel = 'national' | 'state' | 'municipality' | 'region';

/** Levels whose values are read from a table rather than aggregated */
export type TabulatedLevel = Exclude<GeographyLevel, 'region'>;

export type RegionMemberLevel = 'state' | 'municipality';

interface NodeBase {
  id: string;
  name: string;
}

export interface NationalNode extends NodeBase {
  level: 'national';
  parentId: null;
  table: string;
}

export interface StateNode extends NodeBase {
  level: 'state';
  parentId: string;
  table: string;
}

export interface MunicipalityNode extends NodeBase {
  level: 'municipality';
  parentId: string;
  table: string;
}

/**
 * Fixed, explicitly enumerated grouping of states or of municipalities.
 * Its values are always derived from its members.
 */
export interface RegionNode extends NodeBase {
  level: 'region';
  parentId: string;
  members: string[];
  memberLevel: RegionMemberLevel;
}

export type TabulatedNode = NationalNode | StateNode | MunicipalityNode;

export type GeographyNode = TabulatedNode | RegionNode;

export interface GeographyHierarchy {
  national: NationalNode;
  states: StateNode[];
  municipalities: MunicipalityNode[];
  regions: RegionNode[];
  /** Every node by id */
  nodes: ReadonlyMap<string, GeographyNode>;
}

export const isRegion = (node: GeographyNode): node is RegionNode => node.level === 'region';

export const tabulatedNodes = (hierarchy: GeographyHierarchy): TabulatedNode[] => [
  hierarchy.national,
  ...hierarchy.states,
  ...hierarchy.municipalities,
];
