import type { GraphWriter } from "../db/GraphWriter.js";
import type { GraphEdge, GraphNode } from "../db/Types.js";
import type { GraphLogger } from "../logging/GraphLogger.js";
import { formatTarget } from "../shared/formatTarget.js";
import {
  type Entity,
  type EntityId,
  isOwnershipRelationship,
  type Relationship,
  type RelationshipTarget,
  type RelationshipType,
} from "../shared/GraphTypes.js";

/** Nodes and edges sent per writer call */
const DEFAULT_BATCH_SIZE = 1000;

export type SkipReason =
  | "unresolved"
  | "ambiguous"
  | "external"
  | "pending"
  | "missing-endpoint";

export interface SkippedEdge {
  source: EntityId;
  type: RelationshipType;
  /** Display form of the target */
  target: string;
  reason: SkipReason;
}

export interface LoadReport {
  nodesWritten: number;
  ownershipEdgesWritten: number;
  dependencyEdgesWritten: number;
  skippedEdges: SkippedEdge[];
  skippedByReason: Record<SkipReason, number>;
  durationMs: number;
}

export interface LoadGraphOptions {
  logger: GraphLogger;
  /** Empty the store before writing */
  clearFirst?: boolean;
  batchSize?: number;
}

interface CandidateEdge {
  edge: GraphEdge;
  target: RelationshipTarget;
}

const toNode = (entity: Entity): GraphNode => ({
  id: entity.id,
  kind: entity.kind,
  name: entity.name,
  filePath: entity.filePath,
  properties: entity.properties,
});

const skipReasonOf = (target: RelationshipTarget): SkipReason | undefined => {
  switch (target.status) {
    case "resolved":
      return undefined;
    case "unresolved":
    case "ambiguous":
    case "external":
      return target.status;
    case "placeholder":
    case "file":
      return "pending";
  }
};

const inBatches = async <T>(
  items: readonly T[],
  size: number,
  write: (batch: T[]) => Promise<void>,
): Promise<void> => {
  for (let i = 0; i < items.length; i += size) {
    await write(items.slice(i, i + size));
  }
};

/**
 * One edge per (source, type, target); later properties win.
 */
const dedupeEdges = (candidates: readonly CandidateEdge[]): CandidateEdge[] => {
  const byKey = new Map<string, CandidateEdge>();
  for (const candidate of candidates) {
    const { source, type, target } = candidate.edge;
    const key = JSON.stringify([source, type, target]);
    const existing = byKey.get(key);
    byKey.set(
      key,
      existing
        ? {
            ...candidate,
            edge: {
              ...candidate.edge,
              properties: {
                ...existing.edge.properties,
                ...candidate.edge.properties,
              },
            },
          }
        : candidate,
    );
  }
  return [...byKey.values()];
};

/**
 * Materialize resolved entities in a graph store.
 *
 * Phase 1 writes every node, then every ownership edge between known nodes.
 * Phase 2 starts only afterwards: dependency edges are created when both
 * endpoints are stored nodes. Nothing is ever created for a missing endpoint;
 * such edges are reported in `skippedEdges`.
 *
 * All writes are upserts, so loading the same entities twice yields the same
 * graph.
 *
 * @throws StoreConnectionError when the store cannot be reached
 */
export const loadGraph = async (
  entities: readonly Entity[],
  writer: GraphWriter,
  options: LoadGraphOptions,
): Promise<LoadReport> => {
  const startTime = Date.now();
  const { logger } = options;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const skippedEdges: SkippedEdge[] = [];

  await writer.verifyConnectivity();

  if (options.clearFirst) {
    await writer.clearAll();
  }

  const skip = (
    source: Entity,
    relationship: Relationship,
    reason: SkipReason,
  ): void => {
    skippedEdges.push({
      source: source.id,
      type: relationship.type,
      target: formatTarget(relationship.target),
      reason,
    });
  };

  // Sort resolved relationships into the two phases
  const ownership: CandidateEdge[] = [];
  const dependencies: CandidateEdge[] = [];
  for (const entity of entities) {
    for (const relationship of entity.relationships) {
      const { target } = relationship;
      if (target.status !== "resolved") {
        skip(entity, relationship, skipReasonOf(target) ?? "pending");
        continue;
      }
      const candidate: CandidateEdge = {
        edge: {
          source: entity.id,
          target: target.id,
          type: relationship.type,
          properties: relationship.properties ?? {},
        },
        target,
      };
      if (isOwnershipRelationship(relationship.type)) {
        ownership.push(candidate);
      } else {
        dependencies.push(candidate);
      }
    }
  }

  // Phase 1: hierarchy
  const nodes = entities.map(toNode);
  logger.phase("load", `hierarchy: ${nodes.length} nodes`);
  await inBatches(nodes, batchSize, (batch) => writer.upsertNodes(batch));
  const nodeIds = new Set(nodes.map((node) => node.id));

  const ownershipEdges: GraphEdge[] = [];
  for (const { edge, target } of dedupeEdges(ownership)) {
    if (nodeIds.has(edge.source) && nodeIds.has(edge.target)) {
      ownershipEdges.push(edge);
    } else {
      skippedEdges.push({
        source: edge.source,
        type: edge.type,
        target: formatTarget(target),
        reason: "missing-endpoint",
      });
    }
  }
  await inBatches(ownershipEdges, batchSize, (batch) =>
    writer.upsertEdges(batch),
  );

  // Phase 2: dependencies, against what the store actually holds
  const dependencyCandidates = dedupeEdges(dependencies);
  logger.phase(
    "load",
    `dependencies: ${dependencyCandidates.length} candidate edges`,
  );
  const endpointIds = [
    ...new Set(
      dependencyCandidates.flatMap(({ edge }) => [edge.source, edge.target]),
    ),
  ];
  const storedIds = await writer.findExistingNodeIds(endpointIds);

  const dependencyEdges: GraphEdge[] = [];
  for (const { edge, target } of dependencyCandidates) {
    if (storedIds.has(edge.source) && storedIds.has(edge.target)) {
      dependencyEdges.push(edge);
    } else {
      skippedEdges.push({
        source: edge.source,
        type: edge.type,
        target: formatTarget(target),
        reason: "missing-endpoint",
      });
    }
  }
  await inBatches(dependencyEdges, batchSize, (batch) =>
    writer.upsertEdges(batch),
  );

  const skippedByReason: Record<SkipReason, number> = {
    unresolved: 0,
    ambiguous: 0,
    external: 0,
    pending: 0,
    "missing-endpoint": 0,
  };
  for (const skipped of skippedEdges) {
    skippedByReason[skipped.reason]++;
    if (skipped.reason !== "external") {
      logger.warn(
        `Skipped edge ${skipped.source} -${skipped.type}-> ${skipped.target} (${skipped.reason})`,
      );
    }
  }
  if (skippedByReason.external > 0) {
    logger.info(
      `Skipped ${skippedByReason.external} imports of modules outside the analyzed tree`,
    );
  }

  return {
    nodesWritten: nodes.length,
    ownershipEdgesWritten: ownershipEdges.length,
    dependencyEdgesWritten: dependencyEdges.length,
    skippedEdges,
    skippedByReason,
    durationMs: Date.now() - startTime,
  };
};
