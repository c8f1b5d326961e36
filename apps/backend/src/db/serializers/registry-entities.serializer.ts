import {
  AgentSkillSchema,
  CustomMetadataSchema,
  type RegisteredEntitySummary,
  ToolDefinitionSchema,
} from "@repo/zod-types";
import { z } from "zod";

import { fromMetadataMap, toMetadataMap } from "../../lib/registry/metadata";
import { type RegisteredEntity, parentServerIdOf } from "../../lib/registry/types";
import type { DatabaseRegistryEntity, NewDatabaseRegistryEntity } from "../schema";

const ServerDetailsSchema = z.object({
  tools: z.array(ToolDefinitionSchema).default([]),
});

const ToolDetailsSchema = z.object({
  toolName: z.string(),
});

const AgentDetailsSchema = z.object({
  skills: z.array(AgentSkillSchema).default([]),
  trustLevel: z.string().nullable().default(null),
  visibility: z.string().default("public"),
});

export class RegistryEntitiesSerializer {
  static toRow(entity: RegisteredEntity): NewDatabaseRegistryEntity {
    let details: Record<string, unknown>;
    switch (entity.kind) {
      case "server":
        details = { tools: entity.tools };
        break;
      case "tool":
        details = { toolName: entity.toolName };
        break;
      case "agent":
        details = {
          skills: entity.skills,
          trustLevel: entity.trustLevel,
          visibility: entity.visibility,
        };
        break;
    }

    return {
      id: entity.id,
      kind: entity.kind,
      display_name: entity.displayName,
      description: entity.description,
      tags: [...entity.tags],
      custom_metadata: fromMetadataMap(entity.customMetadata),
      enabled: entity.enabled,
      owner_group: entity.ownerGroup,
      safety_status: entity.safetyStatus,
      details,
      parent_server_id: parentServerIdOf(entity),
      created_at: entity.createdAt,
      updated_at: entity.updatedAt,
    };
  }

  static fromRow(row: DatabaseRegistryEntity): RegisteredEntity {
    const base = {
      id: row.id,
      displayName: row.display_name,
      description: row.description,
      tags: row.tags,
      customMetadata: toMetadataMap(CustomMetadataSchema.parse(row.custom_metadata)),
      enabled: row.enabled,
      ownerGroup: row.owner_group,
      safetyStatus: row.safety_status,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };

    switch (row.kind) {
      case "server": {
        const details = ServerDetailsSchema.parse(row.details);
        return { ...base, kind: "server", tools: details.tools };
      }
      case "tool": {
        const details = ToolDetailsSchema.parse(row.details);
        return {
          ...base,
          kind: "tool",
          toolName: details.toolName,
          parentServerId: row.parent_server_id,
        };
      }
      case "agent": {
        const details = AgentDetailsSchema.parse(row.details);
        return { ...base, kind: "agent", ...details };
      }
    }
  }

  static serializeSummary(entity: RegisteredEntity): RegisteredEntitySummary {
    return {
      id: entity.id,
      kind: entity.kind,
      displayName: entity.displayName,
      description: entity.description,
      tags: [...entity.tags],
      enabled: entity.enabled,
      ownerGroup: entity.ownerGroup,
      safetyStatus: entity.safetyStatus,
      parentServerId: parentServerIdOf(entity),
      created_at: entity.createdAt.toISOString(),
      updated_at: entity.updatedAt.toISOString(),
    };
  }
}
