import { RegistryFrozenError } from "../shared/errors.js";
import type { Entity, EntityId } from "../shared/GraphTypes.js";
import { mergeEntity } from "./mergeEntity.js";

/**
 * Accumulates entities keyed by identity.
 *
 * Lifecycle: created empty, populated through `register`/`mergeScan`,
 * then frozen. After `freeze()` only relationship targets may change
 * (rewritten by the resolver through `entities()`).
 */
export interface EntityRegistry {
  /**
   * Register an entity, or merge it into the one already known under its id.
   * The registry keeps its own copy.
   *
   * @returns The registered (possibly merged) entity
   * @throws RegistryFrozenError after `freeze()`
   */
  register(entity: Entity): Entity;

  /**
   * Merge a finished scan, one entity at a time.
   *
   * @throws RegistryFrozenError after `freeze()`
   */
  mergeScan(entities: readonly Entity[]): void;

  get(id: EntityId): Entity | undefined;

  has(id: EntityId): boolean;

  /** Registered entities in registration order */
  entities(): Entity[];

  readonly size: number;

  freeze(): void;

  readonly isFrozen: boolean;
}

export const createEntityRegistry = (): EntityRegistry => {
  const byId = new Map<EntityId, Entity>();
  let frozen = false;

  const register = (entity: Entity): Entity => {
    if (frozen) {
      throw new RegistryFrozenError(
        `Cannot register ${entity.id}: the registry is frozen`,
      );
    }

    const copy = structuredClone(entity);
    const existing = byId.get(entity.id);
    if (existing) {
      return mergeEntity(existing, copy);
    }

    byId.set(entity.id, copy);
    return copy;
  };

  return {
    register,

    mergeScan(entities: readonly Entity[]): void {
      for (const entity of entities) {
        register(entity);
      }
    },

    get(id: EntityId): Entity | undefined {
      return byId.get(id);
    },

    has(id: EntityId): boolean {
      return byId.has(id);
    },

    entities(): Entity[] {
      return [...byId.values()];
    },

    get size(): number {
      return byId.size;
    },

    freeze(): void {
      frozen = true;
    },

    get isFrozen(): boolean {
      return frozen;
    },
  };
};
