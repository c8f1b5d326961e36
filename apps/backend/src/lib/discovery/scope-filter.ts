import type { CallerScope, EntityKind } from "@repo/zod-types";

import type { StoreSnapshot } from "../registry/entity-store";
import type { RegisteredEntity } from "../registry/types";

export const WILDCARD_GROUP = "*";

const BLOCKED_SAFETY = new Set(["unsafe", "pending"]);

/**
 * Decides which entities a caller may discover. Applied before ranking, so
 * an unauthorized entity never reaches the ranker and its score is never
 * computed.
 */
export class ScopeFilter {
  constructor(private readonly publicGroup: string = "public") {}

  /**
   * Enabled, not flagged by the security scanner, and (for tools derived from
   * a server manifest) attached to a server that is itself eligible.
   */
  isEligible(entity: RegisteredEntity, snapshot: StoreSnapshot): boolean {
    if (!entity.enabled || BLOCKED_SAFETY.has(entity.safetyStatus)) return false;
    if (entity.kind === "tool" && entity.parentServerId !== null) {
      const parent = snapshot.entities.get(entity.parentServerId);
      return parent !== undefined && this.isEligible(parent, snapshot);
    }
    return true;
  }

  /** Owner group, explicit memberships and, for derived tools, the parent's groups. */
  effectiveGroups(entity: RegisteredEntity, snapshot: StoreSnapshot): Set<string> {
    const groups = new Set<string>(snapshot.memberships.get(entity.id) ?? []);
    groups.add(entity.ownerGroup);
    if (entity.kind === "tool" && entity.parentServerId !== null) {
      const parent = snapshot.entities.get(entity.parentServerId);
      if (parent) {
        for (const group of this.effectiveGroups(parent, snapshot)) groups.add(group);
      }
    }
    return groups;
  }

  isPublic(groups: ReadonlySet<string>): boolean {
    return groups.has(this.publicGroup) || groups.has(WILDCARD_GROUP);
  }

  canSee(scope: CallerScope, entity: RegisteredEntity, snapshot: StoreSnapshot): boolean {
    if (!this.isEligible(entity, snapshot)) return false;
    if (scope.isAdmin) return true;

    const groups = this.effectiveGroups(entity, snapshot);
    if (this.isPublic(groups)) return true;
    return scope.authorizedGroupPaths.some((path) => groups.has(path));
  }

  /** Ids of `kind` entities the caller may discover. */
  allowedIds(scope: CallerScope, kind: EntityKind, snapshot: StoreSnapshot): Set<string> {
    const allowed = new Set<string>();
    for (const entity of snapshot.entities.values()) {
      if (entity.kind === kind && this.canSee(scope, entity, snapshot)) {
        allowed.add(entity.id);
      }
    }
    return allowed;
  }
}
