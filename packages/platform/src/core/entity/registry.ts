/**
 * Entity Registry
 *
 * Central registry of the entity classes relation fields can point at.
 * The domain registers its catalogue here when it is imported; relation
 * fields name their target and look it up lazily, so entity modules can
 * reference each other in cycles.
 */

import { EntityNotRegisteredError } from "@satkit/contracts";
import type { EntityClass } from "./entity.js";

/** All registered entity classes, keyed by entity name */
const entities = new Map<string, EntityClass>();

/**
 * Registers an entity class under `name`.
 * Registering the same class twice is a no-op; a different class under a
 * taken name is an error.
 */
export function registerEntity(name: string, entity: EntityClass): void {
  const existing = entities.get(name);
  if (existing !== undefined && existing !== entity) {
    throw new Error(
      `Entity "${name}" is already registered. Entity names must be unique.`
    );
  }
  entities.set(name, entity);
}

/**
 * Registers several entity classes at once, keyed by name.
 */
export function registerEntities(entityMap: Record<string, EntityClass>): void {
  for (const [name, entity] of Object.entries(entityMap)) {
    registerEntity(name, entity);
  }
}

export function getEntityClass(name: string): EntityClass | undefined {
  return entities.get(name);
}

/** Like getEntityClass, but throws EntityNotRegisteredError for unknown names. */
export function resolveEntity(name: string): EntityClass {
  const entity = entities.get(name);
  if (entity === undefined) {
    throw new EntityNotRegisteredError(name);
  }
  return entity;
}

/**
 * Returns the names of all registered entities, in registration order.
 */
export function getEntityNames(): string[] {
  return Array.from(entities.keys());
}

/**
 * Clears all registered entities. Used for testing.
 */
export function clearEntityRegistry(): void {
  entities.clear();
}
