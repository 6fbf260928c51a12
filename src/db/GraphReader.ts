import type { EntityId } from "../shared/GraphTypes.js";
import type { EdgeFilter, GraphEdge, GraphNode } from "./Types.js";

/**
 * Read side of a graph store (summaries and tests; querying is out of scope).
 */
export interface GraphReader {
  getNode(id: EntityId): Promise<GraphNode | undefined>;

  countNodes(): Promise<number>;

  countEdges(): Promise<number>;

  /**
   * Edges matching every given field, ordered by source, type, target.
   */
  getEdges(filter?: EdgeFilter): Promise<GraphEdge[]>;
}
