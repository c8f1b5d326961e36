import { TRPCError } from "@trpc/server";
import { beforeEach, describe, expect, it } from "vitest";

import { createBackendRouter } from "../src/index";
import { createTestEngine, silenceConsole } from "./helpers";

async function setup() {
  const { engine } = createTestEngine();
  await engine.start();
  const router = createBackendRouter(engine);
  const admin = router.createCaller({
    user: { id: "admin-1", callerScope: { authorizedGroupPaths: [], isAdmin: true } },
  });
  const reader = router.createCaller({
    user: { id: "user-1", callerScope: { authorizedGroupPaths: ["public"], isAdmin: false } },
  });
  return { engine, router, admin, reader };
}

describe("backend router", () => {
  beforeEach(() => {
    silenceConsole();
  });

  it("registers an entity and discovers it", async () => {
    const { engine, admin, reader } = await setup();

    const registered = await admin.frontend.registry.register({
      kind: "tool",
      id: "/weather-tool",
      displayName: "Weather Tool",
      description: "get current weather",
    });
    expect(registered).toMatchObject({
      success: true,
      data: { id: "/weather-tool", kind: "tool", ownerGroup: "public", parentServerId: null },
    });
    await engine.synchronizer.flush();

    const discovered = await reader.frontend.discovery.discover({ query: "weather" });
    expect(discovered.success).toBe(true);
    expect(discovered.data.tools.map((result) => result.entityId)).toEqual(["/weather-tool"]);
    await engine.stop();
  });

  it("forbids reindexing for non-admin callers", async () => {
    const { engine, admin, reader } = await setup();

    await expect(reader.frontend.discovery.reindex({ target: "all" })).rejects.toMatchObject({
      code: "FORBIDDEN",
    });
    await expect(admin.frontend.discovery.reindex({ target: "all" })).resolves.toEqual({
      success: true,
      data: { indexed: 0, removed: 0, unchanged: 0, failed: 0 },
      message: "Index rebuilt",
    });
    await engine.stop();
  });

  it("reports an unknown reindex target", async () => {
    const { engine, admin } = await setup();
    await expect(admin.frontend.discovery.reindex({ target: "/nope" })).resolves.toEqual({
      success: false,
      message: 'Entity "/nope" not found',
    });
    await engine.stop();
  });

  it("requires a caller", async () => {
    const { engine, router } = await setup();
    const anonymous = router.createCaller({});

    await expect(anonymous.frontend.discovery.stats()).rejects.toBeInstanceOf(TRPCError);
    await expect(anonymous.frontend.discovery.stats()).rejects.toMatchObject({
      code: "UNAUTHORIZED",
    });
    await engine.stop();
  });

  it("rejects invalid registrations", async () => {
    const { engine, admin } = await setup();
    await expect(
      admin.frontend.registry.register({ kind: "tool", id: "/blank", displayName: "" }),
    ).rejects.toMatchObject({ code: "BAD_REQUEST" });
    await engine.stop();
  });

  it("manages entity state and groups", async () => {
    const { engine, admin } = await setup();
    await admin.frontend.registry.register({
      kind: "tool",
      id: "/finance-tool",
      displayName: "Finance Tool",
      description: "query quarterly revenue",
      ownerGroup: "finance/read",
    });

    await expect(
      admin.frontend.registry.setEnabled({ id: "/finance-tool", enabled: false }),
    ).resolves.toMatchObject({ success: true, data: { enabled: false }, message: "Entity disabled" });
    await expect(
      admin.frontend.registry.setSafetyStatus({ id: "/finance-tool", safetyStatus: "safe" }),
    ).resolves.toMatchObject({ success: true, data: { safetyStatus: "safe" } });
    await expect(
      admin.frontend.registry.putGroup({ groupPath: "finance/audit", memberEntityIds: ["/finance-tool"] }),
    ).resolves.toEqual({
      success: true,
      message: "Access group finance/audit now has 1 members",
    });
    await expect(admin.frontend.registry.remove({ id: "/finance-tool" })).resolves.toEqual({
      success: true,
      message: "Entity removed successfully",
    });
    await expect(admin.frontend.registry.remove({ id: "/finance-tool" })).resolves.toEqual({
      success: false,
      message: 'Entity "/finance-tool" not found',
    });
    await engine.synchronizer.flush();
    await expect(admin.frontend.discovery.stats()).resolves.toEqual({
      success: true,
      data: { entities: 0, indexed: 0, stale: 0, byKind: { server: 0, tool: 0, agent: 0 } },
    });
    await engine.stop();
  });
});
