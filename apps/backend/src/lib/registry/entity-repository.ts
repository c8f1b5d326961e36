import type { AccessGroup, RegisteredEntity } from "./types";

/**
 * Persistence port behind the EntityStore. The store owns validation, change
 * events and the in-memory read model; a repository only makes records
 * durable.
 */
export interface EntityRepository {
  loadAll(): Promise<{ entities: RegisteredEntity[]; groups: AccessGroup[] }>;
  saveEntities(entities: readonly RegisteredEntity[]): Promise<void>;
  deleteEntities(ids: readonly string[]): Promise<void>;
  saveGroups(groups: readonly AccessGroup[]): Promise<void>;
  deleteGroup(groupPath: string): Promise<void>;
}

/**
 * In-process repository, used for tests and local development. Records are
 * cloned on the way in and out so callers never share mutable state with it.
 */
export function createMemoryEntityRepository(
  seed: { entities?: RegisteredEntity[]; groups?: AccessGroup[] } = {},
): EntityRepository {
  const entities = new Map<string, RegisteredEntity>();
  const groups = new Map<string, AccessGroup>();

  for (const entity of seed.entities ?? []) entities.set(entity.id, structuredClone(entity));
  for (const group of seed.groups ?? []) groups.set(group.groupPath, structuredClone(group));

  return {
    async loadAll() {
      return {
        entities: [...entities.values()].map((entity) => structuredClone(entity)),
        groups: [...groups.values()].map((group) => structuredClone(group)),
      };
    },

    async saveEntities(batch) {
      for (const entity of batch) entities.set(entity.id, structuredClone(entity));
    },

    async deleteEntities(ids) {
      for (const id of ids) entities.delete(id);
    },

    async saveGroups(batch) {
      for (const group of batch) groups.set(group.groupPath, structuredClone(group));
    },

    async deleteGroup(groupPath) {
      groups.delete(groupPath);
    },
  };
}
