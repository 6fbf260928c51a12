import type { EntityRegistry } from "../analysis/EntityRegistry.js";
import { isRelativeSpecifier } from "../analysis/resolveImportPath.js";
import type { GraphLogger } from "../logging/GraphLogger.js";
import { RegistryFrozenError } from "../shared/errors.js";
import type {
  Entity,
  FileTarget,
  PlaceholderTarget,
  Relationship,
  RelationshipTarget,
} from "../shared/GraphTypes.js";
import {
  buildSymbolIndex,
  findCandidates,
  type SymbolIndex,
} from "./buildSymbolIndex.js";

/**
 * Outcome counts of one resolution pass.
 */
export interface ResolutionStats {
  resolved: number;
  unresolved: number;
  ambiguous: number;
  external: number;
}

const countOutcome = (
  stats: ResolutionStats,
  target: RelationshipTarget,
): void => {
  switch (target.status) {
    case "resolved":
    case "unresolved":
    case "ambiguous":
    case "external":
      stats[target.status]++;
      break;
    default:
      break;
  }
};

const resolvedRegistries = new WeakSet<EntityRegistry>();

const resolvePlaceholder = (
  index: SymbolIndex,
  entity: Entity,
  relationship: Relationship,
  target: PlaceholderTarget,
  logger: GraphLogger,
): RelationshipTarget => {
  const candidates = findCandidates(index, target.hint, target.name);
  const [only] = candidates;

  if (candidates.length === 1 && only !== undefined) {
    return { status: "resolved", id: only };
  }
  if (candidates.length === 0) {
    return { status: "unresolved", name: target.name };
  }

  logger.warn(
    `Ambiguous relationship: ${entity.id} -${relationship.type}-> ${target.name}. Found ${candidates.length} candidates.`,
  );
  return { status: "ambiguous", name: target.name, candidates };
};

const resolveFileTarget = (
  index: SymbolIndex,
  entity: Entity,
  target: FileTarget,
  logger: GraphLogger,
): RelationshipTarget => {
  if (index.fileIds.has(target.path)) {
    return { status: "resolved", id: target.path };
  }
  if (!isRelativeSpecifier(target.specifier)) {
    return { status: "external", specifier: target.specifier };
  }

  logger.warn(
    `Import "${target.specifier}" in ${entity.id} points to ${target.path}, which no project declares.`,
  );
  return { status: "unresolved", name: target.specifier };
};

/**
 * Rewrite every placeholder and file target of a frozen registry.
 *
 * Only `target` fields change: kinds and properties stay as scanned.
 * Runs once per registry.
 *
 * @throws Error if the registry is not frozen
 * @throws RegistryFrozenError if the registry was already resolved
 */
export const resolveRelationships = (
  registry: EntityRegistry,
  logger: GraphLogger,
): ResolutionStats => {
  if (!registry.isFrozen) {
    throw new Error("Cannot resolve relationships before the registry is frozen");
  }
  if (resolvedRegistries.has(registry)) {
    throw new RegistryFrozenError("Relationships were already resolved");
  }
  resolvedRegistries.add(registry);

  const entities = registry.entities();
  const index = buildSymbolIndex(entities);
  const stats: ResolutionStats = {
    resolved: 0,
    unresolved: 0,
    ambiguous: 0,
    external: 0,
  };

  for (const entity of entities) {
    for (const relationship of entity.relationships) {
      const { target } = relationship;
      if (target.status === "placeholder") {
        relationship.target = resolvePlaceholder(
          index,
          entity,
          relationship,
          target,
          logger,
        );
      } else if (target.status === "file") {
        relationship.target = resolveFileTarget(index, entity, target, logger);
      } else {
        continue;
      }

      countOutcome(stats, relationship.target);
    }
  }

  return stats;
};
