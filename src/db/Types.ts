import type {
  EntityId,
  EntityKind,
  FilePath,
  Properties,
  RelationshipType,
} from "../shared/GraphTypes.js";

/**
 * A stored node. Label = kind, key = id.
 */
export interface GraphNode {
  id: EntityId;
  kind: EntityKind;
  name: string;
  filePath: FilePath;
  properties: Properties;
}

/**
 * A stored typed edge. At most one per (source, target, type).
 */
export interface GraphEdge {
  source: EntityId;
  target: EntityId;
  type: RelationshipType;
  properties: Properties;
}

export interface EdgeFilter {
  source?: EntityId;
  target?: EntityId;
  type?: RelationshipType;
}
