import { errorMessage, StoreConnectionError } from "../../shared/errors.js";
import type { EntityId, RelationshipType } from "../../shared/GraphTypes.js";
import type { GraphWriter } from "../GraphWriter.js";
import type { GraphEdge, GraphNode } from "../Types.js";
import type { CypherRunner } from "./CypherRunner.js";

/** Rows sent per UNWIND query */
export const BOLT_BATCH_SIZE = 500;

/** Label every node carries next to its kind label */
const ENTITY_LABEL = "Entity";

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Labels and relationship types cannot be query parameters. Kinds and types
 * come from closed sets, so they are checked and inlined.
 */
const assertIdentifier = (value: string): string => {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(value)) {
    throw new Error(`Invalid label or relationship type: ${value}`);
  }
  return value;
};

const groupBy = <T, K extends string>(
  items: readonly T[],
  keyOf: (item: T) => K,
): Map<K, T[]> => {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
};

/**
 * Create a GraphWriter that writes through Bolt (Neo4j, Memgraph).
 *
 * Nodes are merged on `Entity.id`, then labeled with their kind. Edges are
 * merged per (source, type, target).
 */
export const createBoltWriter = (runner: CypherRunner): GraphWriter => {
  let constraintEnsured = false;

  const ensureConstraint = async (): Promise<void> => {
    if (constraintEnsured) {
      return;
    }
    await runner.run(
      `CREATE CONSTRAINT entity_id IF NOT EXISTS FOR (n:${ENTITY_LABEL}) REQUIRE n.id IS UNIQUE`,
    );
    constraintEnsured = true;
  };

  return {
    async verifyConnectivity(): Promise<void> {
      try {
        await runner.verifyConnectivity();
      } catch (e) {
        throw new StoreConnectionError(
          `Cannot reach graph database: ${errorMessage(e)}`,
          { cause: e },
        );
      }
    },

    async upsertNodes(nodes: GraphNode[]): Promise<void> {
      await ensureConstraint();
      for (const [kind, group] of groupBy(nodes, (node) => node.kind)) {
        const label = assertIdentifier(kind);
        for (const batch of chunk(group, BOLT_BATCH_SIZE)) {
          await runner.run(
            `UNWIND $batch AS item
MERGE (n:${ENTITY_LABEL} {id: item.id})
SET n:${label}
SET n += item.properties`,
            {
              batch: batch.map((node) => ({
                id: node.id,
                properties: {
                  ...node.properties,
                  kind: node.kind,
                  name: node.name,
                  filePath: node.filePath,
                },
              })),
            },
          );
        }
      }
    },

    async upsertEdges(edges: GraphEdge[]): Promise<void> {
      const groups = groupBy<GraphEdge, RelationshipType>(
        edges,
        (edge) => edge.type,
      );
      for (const [type, group] of groups) {
        const relationshipType = assertIdentifier(type);
        for (const batch of chunk(group, BOLT_BATCH_SIZE)) {
          await runner.run(
            `UNWIND $batch AS item
MATCH (a:${ENTITY_LABEL} {id: item.source})
MATCH (b:${ENTITY_LABEL} {id: item.target})
MERGE (a)-[r:${relationshipType}]->(b)
SET r += item.properties`,
            {
              batch: batch.map((edge) => ({
                source: edge.source,
                target: edge.target,
                properties: edge.properties,
              })),
            },
          );
        }
      }
    },

    async findExistingNodeIds(
      ids: readonly EntityId[],
    ): Promise<Set<EntityId>> {
      const existing = new Set<EntityId>();
      for (const batch of chunk(ids, BOLT_BATCH_SIZE)) {
        const records = await runner.run(
          `MATCH (n:${ENTITY_LABEL}) WHERE n.id IN $ids RETURN n.id AS id`,
          { ids: batch },
        );
        for (const record of records) {
          if (typeof record.id === "string") {
            existing.add(record.id);
          }
        }
      }
      return existing;
    },

    async clearAll(): Promise<void> {
      await runner.run(`MATCH (n:${ENTITY_LABEL}) DETACH DELETE n`);
    },

    async close(): Promise<void> {
      await runner.close();
    },
  };
};
