/**
 * Entity indexing by match key.
 *
 * Schema containers mix entities with bookkeeping scalars
 * (`last_edited_at`, ...); only object values under non-metadata keys are
 * entities.
 */

import { NON_ENTITY_KEYS } from "../../build-project/models/schema.js";
import type { MatchableEntity, MatchKeyStrategy } from "../interfaces/IReconciliation.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("entity-index");

export type EntityContainer<T extends MatchableEntity> = Record<string, T | string | number | null>;

// =============================================================================
// Strategies
// =============================================================================

export const nameMatchKey: MatchKeyStrategy = {
  name: "name",
  keyOf: (entity) => entity.name,
};

/**
 * Matches on a stable property such as an external key. Entities without
 * the property fall back to their name.
 */
export function propertyMatchKey(property: string): MatchKeyStrategy {
  return {
    name: property,
    keyOf: (entity) => {
      const value = entity[property];
      if (typeof value === "string" && value.length > 0) return value;
      if (typeof value === "number") return String(value);
      return entity.name;
    },
  };
}

/**
 * Resolve a strategy from a CLI/config option; "name" or nothing means the default
 */
export function resolveMatchKey(property?: string): MatchKeyStrategy {
  if (!property || property === nameMatchKey.name) return nameMatchKey;
  return propertyMatchKey(property);
}

// =============================================================================
// Indexing
// =============================================================================

/**
 * Entities of a container as [id, entity] pairs, in container order
 */
export function entityEntries<T extends MatchableEntity>(container: EntityContainer<T>): Array<[string, T]> {
  const entries: Array<[string, T]> = [];
  for (const [id, value] of Object.entries(container)) {
    if (NON_ENTITY_KEYS.has(id)) continue;
    if (typeof value !== "object" || value === null) continue;
    entries.push([id, value]);
  }
  return entries;
}

export interface IndexedEntity<T extends MatchableEntity> {
  id: string;
  entity: T;
}

/**
 * Build key → entity record for a container. When two entities share a key
 * the later one wins; the key keeps its first position in iteration order.
 */
export function indexEntityRecords<T extends MatchableEntity>(
  container: EntityContainer<T>,
  strategy: MatchKeyStrategy = nameMatchKey,
  kind: string = "entity"
): Map<string, IndexedEntity<T>> {
  const index = new Map<string, IndexedEntity<T>>();

  for (const [id, entity] of entityEntries(container)) {
    const key = strategy.keyOf(entity, id);
    if (key === undefined) continue;

    const previous = index.get(key);
    if (previous !== undefined) {
      logger.warn(
        { kind, key, previousId: previous.id, id, matchKey: strategy.name },
        "Duplicate match key, later entry wins"
      );
    }
    index.set(key, { id, entity });
  }

  return index;
}
