import type {
  AgentSkill,
  EntityKind,
  SafetyStatus,
  ToolDefinition,
} from "@repo/zod-types";

import type { MetadataMap } from "./metadata";

export type { EntityKind, SafetyStatus };

interface EntityBase {
  /** Registry path, unique across all kinds */
  id: string;
  displayName: string;
  description: string;
  tags: readonly string[];
  customMetadata: MetadataMap;
  enabled: boolean;
  ownerGroup: string;
  safetyStatus: SafetyStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface ServerEntity extends EntityBase {
  kind: "server";
  tools: readonly ToolDefinition[];
}

export interface ToolEntity extends EntityBase {
  kind: "tool";
  toolName: string;
  // null for tools registered on their own rather than derived from a manifest
  parentServerId: string | null;
}

export interface AgentEntity extends EntityBase {
  kind: "agent";
  skills: readonly AgentSkill[];
  trustLevel: string | null;
  visibility: string;
}

export type RegisteredEntity = ServerEntity | ToolEntity | AgentEntity;

/** Registration payload: timestamps are assigned by the store. */
export type EntityDraft =
  | Omit<ServerEntity, "createdAt" | "updatedAt">
  | Omit<ToolEntity, "createdAt" | "updatedAt">
  | Omit<AgentEntity, "createdAt" | "updatedAt">;

export interface AccessGroup {
  groupPath: string;
  memberEntityIds: ReadonlySet<string>;
}

export type ChangeKind = "created" | "updated" | "deleted" | "enabled" | "disabled";

export interface ChangeEvent {
  entityId: string;
  entityKind: EntityKind;
  kind: ChangeKind;
}

export type ChangeListener = (event: ChangeEvent) => void;

export interface EntityListFilter {
  kinds?: readonly EntityKind[];
  enabled?: boolean;
  parentServerId?: string;
}

export const ENTITY_KINDS: readonly EntityKind[] = ["server", "tool", "agent"];

export function parentServerIdOf(entity: RegisteredEntity): string | null {
  return entity.kind === "tool" ? entity.parentServerId : null;
}

/** Derived tool ids follow the `serverName__toolName` convention. */
export function toolEntityId(serverId: string, toolName: string): string {
  return `${serverId}__${toolName}`;
}
