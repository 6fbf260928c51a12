/** Type alias for file paths (relative from the analyzed root, `/` separators). */
export type FilePath = string;

/** Type alias for entity IDs (see `generateEntityId`). */
export type EntityId = string;

export const ROOT_ENTITY_KINDS = ["Project", "File"] as const;

/** Kinds produced for class-like and interface declarations. */
export const DECLARATION_KINDS = [
  "Class",
  "Component",
  "Service",
  "Module",
  "Pipe",
  "Directive",
  "Interface",
  "Unknown",
] as const;

export const MEMBER_ENTITY_KINDS = ["Method"] as const;

export const ENTITY_KINDS = [
  ...ROOT_ENTITY_KINDS,
  ...DECLARATION_KINDS,
  ...MEMBER_ENTITY_KINDS,
] as const;

export type DeclarationKind = (typeof DECLARATION_KINDS)[number];
export type EntityKind = (typeof ENTITY_KINDS)[number];

/** Kinds assigned from a recognized decorator. */
export const STEREOTYPE_KINDS = [
  "Component",
  "Service",
  "Module",
  "Pipe",
  "Directive",
] as const satisfies readonly DeclarationKind[];

export type StereotypeKind = (typeof STEREOTYPE_KINDS)[number];

export const OWNERSHIP_RELATIONSHIP_TYPES = [
  "CONTAINS",
  "DEFINED_IN",
  "HAS_MEMBER",
  "DECLARES",
] as const;

export const DEPENDENCY_RELATIONSHIP_TYPES = [
  "IMPORTS",
  "PROVIDES",
  "IMPORTS_MODULE",
  "EXPORTS_MODULE",
  "BOOTSTRAPS",
  "INJECTS",
  "IMPLEMENTS",
  "USES_PIPE",
  "USES_DIRECTIVE",
] as const;

export const RELATIONSHIP_TYPES = [
  ...OWNERSHIP_RELATIONSHIP_TYPES,
  ...DEPENDENCY_RELATIONSHIP_TYPES,
] as const;

export type OwnershipRelationshipType =
  (typeof OWNERSHIP_RELATIONSHIP_TYPES)[number];
export type DependencyRelationshipType =
  (typeof DEPENDENCY_RELATIONSHIP_TYPES)[number];
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

/**
 * Kind hint carried by a placeholder target.
 * "Any" is used for module declaration and export lists.
 */
export const KIND_HINTS = [
  "Any",
  "Service",
  "Module",
  "Component",
  "Interface",
  "Pipe",
  "Directive",
] as const;

export type KindHint = (typeof KIND_HINTS)[number];

/** Scalar or name-list value stored on entities and relationships. */
export type PropertyValue = string | number | boolean | string[];

export type Properties = Record<string, PropertyValue>;

// Relationship targets (discriminated union on `status`)

export interface ResolvedTarget {
  status: "resolved";
  id: EntityId;
}

/** Kind hint + bare name, pending global resolution. */
export interface PlaceholderTarget {
  status: "placeholder";
  hint: KindHint;
  name: string;
}

/** Import of an existing path, pending lookup among the scanned files. */
export interface FileTarget {
  status: "file";
  path: FilePath;
  specifier: string;
}

export interface ExternalTarget {
  status: "external";
  specifier: string;
}

export interface UnresolvedTarget {
  status: "unresolved";
  name: string;
}

export interface AmbiguousTarget {
  status: "ambiguous";
  name: string;
  candidates: EntityId[];
}

export type RelationshipTarget =
  | ResolvedTarget
  | PlaceholderTarget
  | FileTarget
  | ExternalTarget
  | UnresolvedTarget
  | AmbiguousTarget;

export interface Relationship {
  type: RelationshipType;
  target: RelationshipTarget;
  properties?: Properties;
}

export interface Entity {
  id: EntityId;
  kind: EntityKind;
  /** Bare declared name (`AppComponent`), `Class.method` for methods, base name for files */
  name: string;
  /** Declaring file path; the manifest path for projects */
  filePath: FilePath;
  properties: Properties;
  relationships: Relationship[];
}

export const isDeclarationKind = (kind: EntityKind): kind is DeclarationKind =>
  (DECLARATION_KINDS as readonly EntityKind[]).includes(kind);

export const isOwnershipRelationship = (
  type: RelationshipType,
): type is OwnershipRelationshipType =>
  (OWNERSHIP_RELATIONSHIP_TYPES as readonly RelationshipType[]).includes(type);

export const isEntityKind = (value: string): value is EntityKind =>
  (ENTITY_KINDS as readonly string[]).includes(value);

export const isRelationshipType = (value: string): value is RelationshipType =>
  (RELATIONSHIP_TYPES as readonly string[]).includes(value);
