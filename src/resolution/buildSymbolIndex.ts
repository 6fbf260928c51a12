import {
  type DeclarationKind,
  type Entity,
  type EntityId,
  isDeclarationKind,
  type KindHint,
} from "../shared/GraphTypes.js";
import { candidateKinds } from "./kindHints.js";

/**
 * Lookup tables over a frozen entity universe.
 */
export interface SymbolIndex {
  /** `{kind}:{name}` → declaration ids */
  byKindName: ReadonlyMap<string, readonly EntityId[]>;
  /** name → declaration ids, any declaration kind */
  byName: ReadonlyMap<string, readonly EntityId[]>;
  fileIds: ReadonlySet<EntityId>;
}

const kindNameKey = (kind: DeclarationKind, name: string): string =>
  `${kind}:${name}`;

const append = (
  map: Map<string, EntityId[]>,
  key: string,
  id: EntityId,
): void => {
  const ids = map.get(key);
  if (ids) {
    ids.push(id);
  } else {
    map.set(key, [id]);
  }
};

/**
 * Build the index once, after every scan has been merged.
 */
export const buildSymbolIndex = (entities: readonly Entity[]): SymbolIndex => {
  const byKindName = new Map<string, EntityId[]>();
  const byName = new Map<string, EntityId[]>();
  const fileIds = new Set<EntityId>();

  for (const entity of entities) {
    if (entity.kind === "File") {
      fileIds.add(entity.id);
    } else if (isDeclarationKind(entity.kind)) {
      append(byKindName, kindNameKey(entity.kind, entity.name), entity.id);
      append(byName, entity.name, entity.id);
    }
  }

  return { byKindName, byName, fileIds };
};

/**
 * Ids of every declaration named `name` whose kind is compatible with `hint`,
 * sorted so the outcome never depends on scan order.
 */
export const findCandidates = (
  index: SymbolIndex,
  hint: KindHint,
  name: string,
): EntityId[] => {
  const ids =
    hint === "Any"
      ? (index.byName.get(name) ?? [])
      : candidateKinds(hint).flatMap(
          (kind) => index.byKindName.get(kindNameKey(kind, name)) ?? [],
        );
  return [...new Set(ids)].sort();
};
