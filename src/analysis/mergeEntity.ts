import type {
  Entity,
  EntityKind,
  Properties,
  PropertyValue,
  Relationship,
} from "../shared/GraphTypes.js";

/**
 * Rank used when the same identity is seen with different kinds.
 * Higher is more specific. A class merged with a same-named interface
 * (declaration merging) stays a class.
 */
const KIND_SPECIFICITY: Record<EntityKind, number> = {
  Unknown: 0,
  Interface: 1,
  Class: 2,
  Component: 3,
  Service: 3,
  Module: 3,
  Pipe: 3,
  Directive: 3,
  Method: 3,
  File: 3,
  Project: 3,
};

/**
 * Most specific kind wins; on a tie the incoming kind wins.
 *
 * @example
 * mergeKind("Component", "Class") // => "Component"
 * mergeKind("Class", "Service") // => "Service"
 */
export const mergeKind = (
  existing: EntityKind,
  incoming: EntityKind,
): EntityKind =>
  KIND_SPECIFICITY[incoming] >= KIND_SPECIFICITY[existing]
    ? incoming
    : existing;

const isEmptyValue = (value: PropertyValue): boolean =>
  value === "" || (Array.isArray(value) && value.length === 0);

/**
 * Union of both property sets. An incoming value overrides an existing one
 * unless it is empty.
 */
export const mergeProperties = (
  existing: Properties,
  incoming: Properties,
): Properties => {
  const merged: Properties = { ...existing };
  for (const [key, value] of Object.entries(incoming)) {
    if (isEmptyValue(value) && key in merged) {
      continue;
    }
    merged[key] = value;
  }
  return merged;
};

/**
 * Key identifying a relationship for duplicate detection.
 */
export const relationshipKey = (relationship: Relationship): string =>
  JSON.stringify([
    relationship.type,
    relationship.target,
    relationship.properties ?? {},
  ]);

/**
 * Append incoming relationships, skipping exact duplicates.
 */
export const mergeRelationships = (
  existing: Relationship[],
  incoming: Relationship[],
): Relationship[] => {
  const seen = new Set(existing.map(relationshipKey));
  const merged = [...existing];
  for (const relationship of incoming) {
    const key = relationshipKey(relationship);
    if (!seen.has(key)) {
      seen.add(key);
      merged.push(relationship);
    }
  }
  return merged;
};

/**
 * Merge a re-encountered entity into the one already known under its identity.
 * Mutates and returns `existing`.
 */
export const mergeEntity = (existing: Entity, incoming: Entity): Entity => {
  existing.kind = mergeKind(existing.kind, incoming.kind);
  existing.properties = mergeProperties(
    existing.properties,
    incoming.properties,
  );
  existing.relationships = mergeRelationships(
    existing.relationships,
    incoming.relationships,
  );
  return existing;
};
