import {
  boolean,
  index,
  jsonb,
  pgEnum,
  pgTable,
  primaryKey,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const entityKindEnum = pgEnum("entity_kind", ["server", "tool", "agent"]);

export const safetyStatusEnum = pgEnum("safety_status", [
  "safe",
  "unsafe",
  "pending",
  "unknown",
]);

export const registryEntitiesTable = pgTable(
  "registry_entities",
  {
    id: text("id").primaryKey(),
    kind: entityKindEnum("kind").notNull(),
    display_name: text("display_name").notNull(),
    description: text("description").notNull().default(""),
    tags: text("tags").array().notNull().default([]),
    custom_metadata: jsonb("custom_metadata").notNull().default({}),
    enabled: boolean("enabled").notNull().default(true),
    owner_group: text("owner_group").notNull().default("public"),
    safety_status: safetyStatusEnum("safety_status").notNull().default("unknown"),
    // Kind-specific fields: tool manifest, agent skills, trust level, ...
    details: jsonb("details").notNull().default({}),
    parent_server_id: text("parent_server_id"),
    created_at: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updated_at: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    kindIdx: index("registry_entities_kind_idx").on(table.kind),
    parentIdx: index("registry_entities_parent_server_idx").on(table.parent_server_id),
  }),
);

export const accessGroupsTable = pgTable("access_groups", {
  group_path: text("group_path").primaryKey(),
  created_at: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const accessGroupMembersTable = pgTable(
  "access_group_members",
  {
    group_path: text("group_path")
      .notNull()
      .references(() => accessGroupsTable.group_path, { onDelete: "cascade" }),
    entity_id: text("entity_id").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.group_path, table.entity_id] }),
    entityIdx: index("access_group_members_entity_idx").on(table.entity_id),
  }),
);

export type DatabaseRegistryEntity = typeof registryEntitiesTable.$inferSelect;
export type NewDatabaseRegistryEntity = typeof registryEntitiesTable.$inferInsert;
export type DatabaseAccessGroupMember = typeof accessGroupMembersTable.$inferSelect;
