import type { SafetyStatus } from "@repo/zod-types";

import { KeyedLock } from "../concurrency/keyed-lock";
import type { EntityRepository } from "./entity-repository";
import { ConflictError, NotFoundError, errorMessage } from "./errors";
import { fromMetadataMap } from "./metadata";
import {
  type AccessGroup,
  type ChangeEvent,
  type ChangeKind,
  type ChangeListener,
  type EntityDraft,
  type EntityListFilter,
  type RegisteredEntity,
  type ServerEntity,
  type ToolEntity,
  parentServerIdOf,
  toolEntityId,
} from "./types";

/**
 * Immutable point-in-time view of the store. Discovery ranks against one of
 * these so a concurrent mutation never changes what an in-flight query sees.
 */
export interface StoreSnapshot {
  readonly entities: ReadonlyMap<string, RegisteredEntity>;
  readonly groups: ReadonlyMap<string, AccessGroup>;
  // entity id -> paths of the groups listing it
  readonly memberships: ReadonlyMap<string, ReadonlySet<string>>;
}

const EMPTY_SNAPSHOT: StoreSnapshot = {
  entities: new Map(),
  groups: new Map(),
  memberships: new Map(),
};

function buildMemberships(
  groups: ReadonlyMap<string, AccessGroup>,
): Map<string, ReadonlySet<string>> {
  const memberships = new Map<string, Set<string>>();
  for (const group of groups.values()) {
    for (const entityId of group.memberEntityIds) {
      const paths = memberships.get(entityId) ?? new Set<string>();
      paths.add(group.groupPath);
      memberships.set(entityId, paths);
    }
  }
  return memberships;
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const body = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`);
    return `{${body.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/** Canonical content of an entity, timestamps excluded. */
function contentFingerprint(entity: EntityDraft | RegisteredEntity): string {
  const { customMetadata, ...rest } = entity;
  const plain: Record<string, unknown> = { ...rest };
  delete plain.createdAt;
  delete plain.updatedAt;
  plain.customMetadata = fromMetadataMap(customMetadata);
  return canonicalJson(plain);
}

function deriveToolDrafts(server: Omit<ServerEntity, "createdAt" | "updatedAt">) {
  return server.tools.map(
    (tool): Omit<ToolEntity, "createdAt" | "updatedAt"> => ({
      id: toolEntityId(server.id, tool.name),
      kind: "tool",
      toolName: tool.name,
      parentServerId: server.id,
      displayName: tool.name,
      description: tool.description,
      tags: [],
      customMetadata: new Map(),
      enabled: server.enabled,
      ownerGroup: server.ownerGroup,
      safetyStatus: server.safetyStatus,
    }),
  );
}

function stamp(
  draft: EntityDraft,
  existing: RegisteredEntity | undefined,
  now: Date,
): RegisteredEntity {
  const createdAt = existing?.createdAt ?? now;
  // The spread keeps the discriminant, so each branch stays a valid variant
  switch (draft.kind) {
    case "server":
      return { ...draft, createdAt, updatedAt: now };
    case "tool":
      return { ...draft, createdAt, updatedAt: now };
    case "agent":
      return { ...draft, createdAt, updatedAt: now };
  }
}

/**
 * Authoritative record of servers, tools and agents.
 *
 * Writes go to the repository first and only then to the in-memory read
 * model, so a failed write is surfaced to the caller and leaves nothing
 * half-applied. Each successful mutation emits one ChangeEvent per affected
 * entity.
 */
export class EntityStore {
  private state: StoreSnapshot = EMPTY_SNAPSHOT;
  private listeners = new Set<ChangeListener>();
  private readonly locks: KeyedLock;
  // Group writes and entity deletions share one lane: a membership can
  // never land for an entity that is being removed.
  private readonly membershipLock = new KeyedLock(1);

  constructor(
    private readonly repository: EntityRepository,
    options: { lockShards?: number } = {},
  ) {
    this.locks = new KeyedLock(options.lockShards ?? 64);
  }

  async load(): Promise<void> {
    const { entities, groups } = await this.repository.loadAll();
    const groupMap = new Map(groups.map((group) => [group.groupPath, group]));
    this.state = {
      entities: new Map(entities.map((entity) => [entity.id, entity])),
      groups: groupMap,
      memberships: buildMemberships(groupMap),
    };
    console.log(
      `[Registry] Loaded ${entities.length} entities and ${groups.length} access groups`,
    );
  }

  snapshot(): StoreSnapshot {
    return this.state;
  }

  subscribe(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  find(id: string): RegisteredEntity | undefined {
    return this.state.entities.get(id);
  }

  get(id: string): RegisteredEntity {
    const entity = this.find(id);
    if (!entity) throw new NotFoundError(id);
    return entity;
  }

  list(filter: EntityListFilter = {}): RegisteredEntity[] {
    const kinds = filter.kinds && filter.kinds.length > 0 ? new Set(filter.kinds) : null;
    return [...this.state.entities.values()]
      .filter((entity) => !kinds || kinds.has(entity.kind))
      .filter((entity) => filter.enabled === undefined || entity.enabled === filter.enabled)
      .filter(
        (entity) =>
          filter.parentServerId === undefined ||
          parentServerIdOf(entity) === filter.parentServerId,
      )
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  /**
   * Create a new entity. Unlike `put`, an existing id is a conflict.
   */
  async create(draft: EntityDraft): Promise<RegisteredEntity> {
    return this.locks.runExclusive(draft.id, async () => {
      if (this.state.entities.has(draft.id)) {
        throw new ConflictError(draft.id);
      }
      return this.write(draft);
    });
  }

  /**
   * Register or re-register an entity. Re-registering identical content is a
   * no-op; changed content updates the record in place.
   */
  async put(draft: EntityDraft): Promise<RegisteredEntity> {
    return this.locks.runExclusive(draft.id, async () => this.write(draft));
  }

  async delete(id: string): Promise<void> {
    await this.locks.runExclusive(id, async () => {
      const entity = this.get(id);
      const removed = [entity, ...this.childrenOf(id)];
      await this.purge(removed.map((item) => item.id));
      for (const item of removed) this.emit(item, "deleted");
    });
  }

  async setEnabled(id: string, enabled: boolean): Promise<RegisteredEntity> {
    return this.locks.runExclusive(id, async () => {
      const updated = await this.patchWithChildren(id, (entity) =>
        entity.enabled === enabled ? null : { ...entity, enabled },
      );
      for (const entity of updated) this.emit(entity, enabled ? "enabled" : "disabled");
      return this.get(id);
    });
  }

  /** Applies a security scanner verdict; derived tools follow their server. */
  async setSafetyStatus(id: string, safetyStatus: SafetyStatus): Promise<RegisteredEntity> {
    return this.locks.runExclusive(id, async () => {
      const updated = await this.patchWithChildren(id, (entity) =>
        entity.safetyStatus === safetyStatus ? null : { ...entity, safetyStatus },
      );
      for (const entity of updated) this.emit(entity, "updated");
      return this.get(id);
    });
  }

  listGroups(): AccessGroup[] {
    return [...this.state.groups.values()].sort((a, b) =>
      a.groupPath.localeCompare(b.groupPath),
    );
  }

  /** Owner group plus every group listing the entity. */
  groupsOf(id: string): string[] {
    const entity = this.get(id);
    const paths = new Set(this.state.memberships.get(id) ?? []);
    paths.add(entity.ownerGroup);
    return [...paths].sort();
  }

  async putGroup(groupPath: string, memberEntityIds: Iterable<string>): Promise<AccessGroup> {
    return this.membershipLock.runExclusive(groupPath, async () => {
      const previous = this.state.groups.get(groupPath);
      const group: AccessGroup = { groupPath, memberEntityIds: new Set(memberEntityIds) };
      await this.applyGroup(group, previous);
      return group;
    });
  }

  async addToGroup(groupPath: string, entityId: string): Promise<AccessGroup> {
    return this.membershipLock.runExclusive(groupPath, async () => {
      this.get(entityId);
      const previous = this.state.groups.get(groupPath);
      const members = new Set(previous?.memberEntityIds ?? []);
      members.add(entityId);
      const group: AccessGroup = { groupPath, memberEntityIds: members };
      await this.applyGroup(group, previous);
      return group;
    });
  }

  async removeFromGroup(groupPath: string, entityId: string): Promise<AccessGroup> {
    return this.membershipLock.runExclusive(groupPath, async () => {
      const previous = this.state.groups.get(groupPath);
      if (!previous) throw new NotFoundError(groupPath, "Access group");
      const members = new Set(previous.memberEntityIds);
      members.delete(entityId);
      const group: AccessGroup = { groupPath, memberEntityIds: members };
      await this.applyGroup(group, previous);
      return group;
    });
  }

  async deleteGroup(groupPath: string): Promise<void> {
    await this.membershipLock.runExclusive(groupPath, async () => {
      const previous = this.state.groups.get(groupPath);
      if (!previous) throw new NotFoundError(groupPath, "Access group");
      await this.repository.deleteGroup(groupPath);
      const groups = new Map(this.state.groups);
      groups.delete(groupPath);
      this.state = { ...this.state, groups, memberships: buildMemberships(groups) };
      this.emitVisibilityChange(previous.memberEntityIds);
    });
  }

  private childrenOf(serverId: string): ToolEntity[] {
    const children: ToolEntity[] = [];
    for (const entity of this.state.entities.values()) {
      if (entity.kind === "tool" && entity.parentServerId === serverId) {
        children.push(entity);
      }
    }
    return children;
  }

  private async write(draft: EntityDraft): Promise<RegisteredEntity> {
    const existing = this.state.entities.get(draft.id);
    if (existing && existing.kind !== draft.kind) {
      throw new ConflictError(draft.id);
    }

    const now = new Date();
    const changes: Array<{ entity: RegisteredEntity; kind: ChangeKind }> = [];

    if (!existing || contentFingerprint(existing) !== contentFingerprint(draft)) {
      changes.push({ entity: stamp(draft, existing, now), kind: existing ? "updated" : "created" });
    }

    const removedTools: ToolEntity[] = [];
    if (draft.kind === "server") {
      const currentChildren = new Map(this.childrenOf(draft.id).map((tool) => [tool.id, tool]));
      for (const toolDraft of deriveToolDrafts(draft)) {
        const current = currentChildren.get(toolDraft.id);
        currentChildren.delete(toolDraft.id);
        if (!current || contentFingerprint(current) !== contentFingerprint(toolDraft)) {
          changes.push({
            entity: stamp(toolDraft, current, now),
            kind: current ? "updated" : "created",
          });
        }
      }
      removedTools.push(...currentChildren.values());
    }

    if (changes.length === 0 && removedTools.length === 0) {
      return existing ?? this.get(draft.id);
    }

    if (changes.length > 0) {
      await this.repository.saveEntities(changes.map((change) => change.entity));
    }

    const entities = new Map(this.state.entities);
    for (const change of changes) entities.set(change.entity.id, change.entity);
    this.state = { ...this.state, entities };
    if (removedTools.length > 0) {
      await this.purge(removedTools.map((tool) => tool.id));
    }

    for (const change of changes) this.emit(change.entity, change.kind);
    for (const tool of removedTools) this.emit(tool, "deleted");

    return this.get(draft.id);
  }

  /** Delete entities and strip them from every access group listing them. */
  private async purge(ids: readonly string[]): Promise<void> {
    await this.membershipLock.runExclusive("purge", async () => {
      const removedIds = new Set(ids);
      const touchedGroups: AccessGroup[] = [];
      for (const group of this.state.groups.values()) {
        const remaining = [...group.memberEntityIds].filter((member) => !removedIds.has(member));
        if (remaining.length !== group.memberEntityIds.size) {
          touchedGroups.push({ groupPath: group.groupPath, memberEntityIds: new Set(remaining) });
        }
      }

      await this.repository.deleteEntities([...removedIds]);
      if (touchedGroups.length > 0) {
        await this.repository.saveGroups(touchedGroups);
      }

      const entities = new Map(this.state.entities);
      for (const removedId of removedIds) entities.delete(removedId);
      const groups = new Map(this.state.groups);
      for (const group of touchedGroups) groups.set(group.groupPath, group);
      this.state = { entities, groups, memberships: buildMemberships(groups) };
    });
  }

  private async patchWithChildren(
    id: string,
    patch: (entity: RegisteredEntity) => RegisteredEntity | null,
  ): Promise<RegisteredEntity[]> {
    const entity = this.get(id);
    const targets: RegisteredEntity[] = [entity, ...this.childrenOf(id)];
    const now = new Date();
    const updated: RegisteredEntity[] = [];
    for (const target of targets) {
      const next = patch(target);
      if (next) updated.push({ ...next, updatedAt: now });
    }
    if (updated.length === 0) return [];

    await this.repository.saveEntities(updated);
    const entities = new Map(this.state.entities);
    for (const item of updated) entities.set(item.id, item);
    this.state = { ...this.state, entities };
    return updated;
  }

  private async applyGroup(group: AccessGroup, previous: AccessGroup | undefined) {
    await this.repository.saveGroups([group]);
    const groups = new Map(this.state.groups);
    groups.set(group.groupPath, group);
    this.state = { ...this.state, groups, memberships: buildMemberships(groups) };

    const affected = new Set<string>(group.memberEntityIds);
    for (const member of previous?.memberEntityIds ?? []) affected.add(member);
    this.emitVisibilityChange(affected);
  }

  private emitVisibilityChange(entityIds: Iterable<string>) {
    for (const entityId of entityIds) {
      const entity = this.state.entities.get(entityId);
      if (entity) this.emit(entity, "updated");
    }
  }

  private emit(entity: RegisteredEntity, kind: ChangeKind) {
    const event: ChangeEvent = { entityId: entity.id, entityKind: entity.kind, kind };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error(
          `[Registry] Change listener failed for ${kind} ${entity.id}: ${errorMessage(error)}`,
        );
      }
    }
  }
}
