import type { CallerScope } from "@repo/zod-types";
import { beforeEach, describe, expect, it } from "vitest";

import { ScopeFilter } from "../src/lib/discovery/scope-filter";
import { createMemoryEntityRepository } from "../src/lib/registry/entity-repository";
import { EntityStore } from "../src/lib/registry/entity-store";
import { draft, silenceConsole, toolDraft } from "./helpers";

const anonymous: CallerScope = { authorizedGroupPaths: [], isAdmin: false };
const financeReader: CallerScope = { authorizedGroupPaths: ["finance/read"], isAdmin: false };
const admin: CallerScope = { authorizedGroupPaths: [], isAdmin: true };

describe("ScopeFilter", () => {
  const filter = new ScopeFilter("public");
  let store: EntityStore;

  beforeEach(async () => {
    silenceConsole();
    store = new EntityStore(createMemoryEntityRepository());
    await store.put(toolDraft("/weather-tool", "get current weather", { ownerGroup: "public" }));
    await store.put(toolDraft("/finance-tool", "query quarterly revenue", { ownerGroup: "finance/read" }));
    await store.put(toolDraft("/shared-tool", "shared by everyone", { ownerGroup: "*" }));
    await store.put(toolDraft("/pending-tool", "awaiting scan", { safetyStatus: "pending" }));
    await store.put(toolDraft("/off-tool", "switched off", { enabled: false }));
    await store.put(
      draft({
        kind: "server",
        id: "/files",
        displayName: "Files",
        ownerGroup: "team-a",
        tools: [{ name: "read_file", description: "read a file" }],
      }),
    );
  });

  const visible = (scope: CallerScope) =>
    [...filter.allowedIds(scope, "tool", store.snapshot())].sort();

  it("shows only public entities to a caller without groups", () => {
    expect(visible(anonymous)).toEqual(["/shared-tool", "/weather-tool"]);
  });

  it("adds entities owned by the caller's groups", () => {
    expect(visible(financeReader)).toEqual(["/finance-tool", "/shared-tool", "/weather-tool"]);
  });

  it("shows every eligible entity to an admin", () => {
    expect(visible(admin)).toEqual([
      "/files__read_file",
      "/finance-tool",
      "/shared-tool",
      "/weather-tool",
    ]);
  });

  it("grants access through explicit group membership", async () => {
    await store.putGroup("finance/read", ["/files__read_file"]);
    expect(visible(financeReader)).toContain("/files__read_file");
  });

  it("lets derived tools inherit their server's groups", async () => {
    await store.putGroup("ops", ["/files"]);
    const ops: CallerScope = { authorizedGroupPaths: ["ops"], isAdmin: false };
    expect(visible(ops)).toContain("/files__read_file");
    expect(filter.effectiveGroups(store.get("/files__read_file"), store.snapshot())).toEqual(
      new Set(["team-a", "ops"]),
    );
  });

  it("hides derived tools whose server is not eligible", async () => {
    const snapshot = store.snapshot();
    const server = store.get("/files");
    const entities = new Map(snapshot.entities);
    entities.set("/files", { ...server, safetyStatus: "unsafe" });

    expect(filter.isEligible(store.get("/files__read_file"), { ...snapshot, entities })).toBe(false);
  });

  it("never passes disabled or pending entities", () => {
    const snapshot = store.snapshot();
    expect(filter.canSee(admin, store.get("/off-tool"), snapshot)).toBe(false);
    expect(filter.canSee(admin, store.get("/pending-tool"), snapshot)).toBe(false);
  });
});
