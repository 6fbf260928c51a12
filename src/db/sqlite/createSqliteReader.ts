import type Database from "better-sqlite3";
import type { EntityId } from "../../shared/GraphTypes.js";
import type { GraphReader } from "../GraphReader.js";
import type { EdgeFilter, GraphEdge, GraphNode } from "../Types.js";
import {
  type EdgeRow,
  type NodeRow,
  rowToEdge,
  rowToNode,
} from "./rowConverters.js";

/**
 * Create a GraphReader implementation backed by SQLite.
 *
 * @param db - better-sqlite3 database instance
 */
export const createSqliteReader = (db: Database.Database): GraphReader => {
  const getNodeStmt = db.prepare<[string], NodeRow>(
    "SELECT id, kind, name, file_path, properties FROM nodes WHERE id = ?",
  );
  const countNodesStmt = db.prepare<[], { count: number }>(
    "SELECT COUNT(*) AS count FROM nodes",
  );
  const countEdgesStmt = db.prepare<[], { count: number }>(
    "SELECT COUNT(*) AS count FROM edges",
  );
  // NULL filter fields match everything
  const getEdgesStmt = db.prepare<
    [{ source: string | null; target: string | null; type: string | null }],
    EdgeRow
  >(`
    SELECT source, target, type, properties FROM edges
    WHERE (@source IS NULL OR source = @source)
      AND (@target IS NULL OR target = @target)
      AND (@type IS NULL OR type = @type)
    ORDER BY source, type, target
  `);

  return {
    async getNode(id: EntityId): Promise<GraphNode | undefined> {
      const row = getNodeStmt.get(id);
      return row ? rowToNode(row) : undefined;
    },

    async countNodes(): Promise<number> {
      return countNodesStmt.get()?.count ?? 0;
    },

    async countEdges(): Promise<number> {
      return countEdgesStmt.get()?.count ?? 0;
    },

    async getEdges(filter: EdgeFilter = {}): Promise<GraphEdge[]> {
      return getEdgesStmt
        .all({
          source: filter.source ?? null,
          target: filter.target ?? null,
          type: filter.type ?? null,
        })
        .map(rowToEdge);
    },
  };
};
