import type { EntityId } from "../shared/GraphTypes.js";
import type { GraphEdge, GraphNode } from "./Types.js";

/**
 * Write side of a graph store.
 * Used by: Graph Store Loader
 */
export interface GraphWriter {
  /**
   * Check that the store answers.
   *
   * @throws StoreConnectionError when it does not
   */
  verifyConnectivity(): Promise<void>;

  /**
   * Upsert nodes by id. Properties of an existing node are merged with the
   * new ones; kind, name and path are overwritten.
   *
   * @throws Error on first failure (fail-fast)
   */
  upsertNodes(nodes: GraphNode[]): Promise<void>;

  /**
   * Upsert edges by (source, target, type). Both endpoints must exist.
   *
   * @throws Error on first failure (fail-fast)
   */
  upsertEdges(edges: GraphEdge[]): Promise<void>;

  /**
   * Which of the given ids are stored nodes.
   */
  findExistingNodeIds(ids: readonly EntityId[]): Promise<Set<EntityId>>;

  /**
   * Remove all nodes and edges.
   *
   * WARNING: Destructive operation.
   */
  clearAll(): Promise<void>;

  close(): Promise<void>;
}
