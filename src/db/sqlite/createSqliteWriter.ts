import type Database from "better-sqlite3";
import { errorMessage, StoreConnectionError } from "../../shared/errors.js";
import type { EntityId } from "../../shared/GraphTypes.js";
import type { GraphWriter } from "../GraphWriter.js";
import type { GraphEdge, GraphNode } from "../Types.js";
import { closeDatabase } from "./sqliteConnection.utils.js";
import { dropAllTables, initializeSchema } from "./sqliteSchema.utils.js";

interface NodeParams {
  id: string;
  kind: string;
  name: string;
  filePath: string;
  properties: string;
}

interface EdgeParams {
  source: string;
  target: string;
  type: string;
  properties: string;
}

/**
 * Create a GraphWriter implementation backed by SQLite.
 *
 * @param db - better-sqlite3 database instance
 */
export const createSqliteWriter = (db: Database.Database): GraphWriter => {
  // Existing properties are merge-patched, so a later partial write never
  // erases what an earlier run stored.
  const upsertNodeStmt = db.prepare<[NodeParams]>(`
    INSERT INTO nodes (id, kind, name, file_path, properties)
    VALUES (@id, @kind, @name, @filePath, @properties)
    ON CONFLICT(id) DO UPDATE SET
      kind = excluded.kind,
      name = excluded.name,
      file_path = excluded.file_path,
      properties = json_patch(nodes.properties, excluded.properties)
  `);

  const upsertEdgeStmt = db.prepare<[EdgeParams]>(`
    INSERT INTO edges (source, target, type, properties)
    VALUES (@source, @target, @type, @properties)
    ON CONFLICT(source, target, type) DO UPDATE SET
      properties = json_patch(edges.properties, excluded.properties)
  `);

  const existingIdsStmt = db.prepare<[string], { id: string }>(`
    SELECT id FROM nodes WHERE id IN (SELECT value FROM json_each(?))
  `);

  // Transaction wrappers for batch operations
  const upsertNodesTransaction = db.transaction((nodes: GraphNode[]) => {
    for (const node of nodes) {
      upsertNodeStmt.run({
        id: node.id,
        kind: node.kind,
        name: node.name,
        filePath: node.filePath,
        properties: JSON.stringify(node.properties),
      });
    }
  });

  const upsertEdgesTransaction = db.transaction((edges: GraphEdge[]) => {
    for (const edge of edges) {
      upsertEdgeStmt.run({
        source: edge.source,
        target: edge.target,
        type: edge.type,
        properties: JSON.stringify(edge.properties),
      });
    }
  });

  return {
    async verifyConnectivity(): Promise<void> {
      try {
        db.prepare("SELECT 1").get();
      } catch (e) {
        throw new StoreConnectionError(
          `SQLite database is not usable: ${errorMessage(e)}`,
          { cause: e },
        );
      }
    },

    async upsertNodes(nodes: GraphNode[]): Promise<void> {
      upsertNodesTransaction(nodes);
    },

    async upsertEdges(edges: GraphEdge[]): Promise<void> {
      upsertEdgesTransaction(edges);
    },

    async findExistingNodeIds(
      ids: readonly EntityId[],
    ): Promise<Set<EntityId>> {
      if (ids.length === 0) {
        return new Set();
      }
      const rows = existingIdsStmt.all(JSON.stringify(ids));
      return new Set(rows.map((row) => row.id));
    },

    async clearAll(): Promise<void> {
      dropAllTables(db);
      initializeSchema(db);
    },

    async close(): Promise<void> {
      closeDatabase(db);
    },
  };
};
