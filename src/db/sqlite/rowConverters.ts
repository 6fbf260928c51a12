import { PropertiesSchema } from "../../shared/GraphSchemas.js";
import {
  isEntityKind,
  isRelationshipType,
  type Properties,
} from "../../shared/GraphTypes.js";
import type { GraphEdge, GraphNode } from "../Types.js";

/**
 * Raw node row from SQLite.
 */
export interface NodeRow {
  id: string;
  kind: string;
  name: string;
  file_path: string;
  properties: string;
}

/**
 * Raw edge row from SQLite.
 */
export interface EdgeRow {
  source: string;
  target: string;
  type: string;
  properties: string;
}

const parseProperties = (json: string): Properties => {
  const parsed: unknown = JSON.parse(json);
  return PropertiesSchema.parse(parsed);
};

/**
 * @throws Error if the row holds a kind this schema version does not know
 */
export const rowToNode = (row: NodeRow): GraphNode => {
  if (!isEntityKind(row.kind)) {
    throw new Error(`Unknown node kind "${row.kind}" for ${row.id}`);
  }
  return {
    id: row.id,
    kind: row.kind,
    name: row.name,
    filePath: row.file_path,
    properties: parseProperties(row.properties),
  };
};

/**
 * @throws Error if the row holds a relationship type this schema version does not know
 */
export const rowToEdge = (row: EdgeRow): GraphEdge => {
  if (!isRelationshipType(row.type)) {
    throw new Error(
      `Unknown edge type "${row.type}" for ${row.source} -> ${row.target}`,
    );
  }
  return {
    source: row.source,
    target: row.target,
    type: row.type,
    properties: parseProperties(row.properties),
  };
};
