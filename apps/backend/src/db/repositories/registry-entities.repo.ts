import { eq, inArray, sql } from "drizzle-orm";

import type { EntityRepository } from "../../lib/registry/entity-repository";
import type { AccessGroup } from "../../lib/registry/types";
import { type Database, getDb } from "../index";
import {
  accessGroupMembersTable,
  accessGroupsTable,
  registryEntitiesTable,
} from "../schema";
import { RegistryEntitiesSerializer } from "../serializers/registry-entities.serializer";

/**
 * Postgres-backed EntityRepository. Each call runs in its own transaction so
 * a server and its derived tools are written together or not at all.
 */
export function createPostgresEntityRepository(
  database: () => Database = getDb,
): EntityRepository {
  return {
    async loadAll() {
      const db = database();
      const rows = await db.select().from(registryEntitiesTable);
      const groupRows = await db.select().from(accessGroupsTable);
      const memberRows = await db.select().from(accessGroupMembersTable);

      const members = new Map<string, Set<string>>();
      for (const group of groupRows) members.set(group.group_path, new Set());
      for (const member of memberRows) {
        const set = members.get(member.group_path) ?? new Set<string>();
        set.add(member.entity_id);
        members.set(member.group_path, set);
      }

      const groups: AccessGroup[] = [...members.entries()].map(([groupPath, memberEntityIds]) => ({
        groupPath,
        memberEntityIds,
      }));

      return {
        entities: rows.map((row) => RegistryEntitiesSerializer.fromRow(row)),
        groups,
      };
    },

    async saveEntities(entities) {
      if (entities.length === 0) return;
      const rows = entities.map((entity) => RegistryEntitiesSerializer.toRow(entity));
      await database().transaction(async (tx) => {
        await tx
          .insert(registryEntitiesTable)
          .values(rows)
          .onConflictDoUpdate({
            target: registryEntitiesTable.id,
            set: {
              kind: sql`excluded.kind`,
              display_name: sql`excluded.display_name`,
              description: sql`excluded.description`,
              tags: sql`excluded.tags`,
              custom_metadata: sql`excluded.custom_metadata`,
              enabled: sql`excluded.enabled`,
              owner_group: sql`excluded.owner_group`,
              safety_status: sql`excluded.safety_status`,
              details: sql`excluded.details`,
              parent_server_id: sql`excluded.parent_server_id`,
              updated_at: sql`excluded.updated_at`,
            },
          });
      });
    },

    async deleteEntities(ids) {
      if (ids.length === 0) return;
      await database().transaction(async (tx) => {
        await tx
          .delete(accessGroupMembersTable)
          .where(inArray(accessGroupMembersTable.entity_id, [...ids]));
        await tx
          .delete(registryEntitiesTable)
          .where(inArray(registryEntitiesTable.id, [...ids]));
      });
    },

    async saveGroups(groups) {
      if (groups.length === 0) return;
      await database().transaction(async (tx) => {
        for (const group of groups) {
          await tx
            .insert(accessGroupsTable)
            .values({ group_path: group.groupPath })
            .onConflictDoNothing();
          await tx
            .delete(accessGroupMembersTable)
            .where(eq(accessGroupMembersTable.group_path, group.groupPath));
          const memberRows = [...group.memberEntityIds].map((entityId) => ({
            group_path: group.groupPath,
            entity_id: entityId,
          }));
          if (memberRows.length > 0) {
            await tx.insert(accessGroupMembersTable).values(memberRows);
          }
        }
      });
    },

    async deleteGroup(groupPath) {
      await database()
        .delete(accessGroupsTable)
        .where(eq(accessGroupsTable.group_path, groupPath));
    },
  };
}
