import { createAppRouter } from "@repo/trpc";

import { closeDb } from "./db";
import { createPostgresEntityRepository } from "./db/repositories";
import {
  type DiscoveryConfig,
  type DiscoveryEngine,
  type DiscoveryEngineOptions,
  createDiscoveryEngine,
  loadDiscoveryConfig,
} from "./lib/discovery";
import { createDiscoveryImplementations } from "./trpc/discovery.impl";
import { createRegistryImplementations } from "./trpc/registry.impl";

export const createBackendRouter = (engine: DiscoveryEngine) =>
  createAppRouter({
    discovery: createDiscoveryImplementations(engine.service),
    registry: createRegistryImplementations(engine.store),
  });

export type BackendRouter = ReturnType<typeof createBackendRouter>;

/**
 * Start the discovery backend on Postgres. The returned `shutdown` stops the
 * sweep, saves the index snapshot and closes the pool.
 */
export async function startDiscoveryBackend(
  config: Readonly<DiscoveryConfig> = loadDiscoveryConfig(),
  overrides: Partial<Omit<DiscoveryEngineOptions, "config">> = {},
) {
  const engine = createDiscoveryEngine({
    config,
    repository: overrides.repository ?? createPostgresEntityRepository(),
    embeddingProvider: overrides.embeddingProvider,
    snapshotStore: overrides.snapshotStore,
    healthSource: overrides.healthSource,
  });
  await engine.start();

  return {
    engine,
    router: createBackendRouter(engine),
    shutdown: async () => {
      console.log("[Discovery] Shutting down...");
      await engine.stop();
      await closeDb();
    },
  };
}

export * from "./lib/discovery";
export * from "./lib/registry";
