import { createDiscoveryRouter } from "./routers/frontend/discovery";
import { createRegistryRouter } from "./routers/frontend/registry";
import { router } from "./trpc";

export { adminProcedure, protectedProcedure, router } from "./trpc";
export type { TrpcContext } from "./trpc";
export { createDiscoveryRouter, createRegistryRouter };

export const createAppRouter = (implementations: {
  discovery: Parameters<typeof createDiscoveryRouter>[0];
  registry: Parameters<typeof createRegistryRouter>[0];
}) => {
  return router({
    frontend: router({
      discovery: createDiscoveryRouter(implementations.discovery),
      registry: createRegistryRouter(implementations.registry),
    }),
  });
};

export type AppRouter = ReturnType<typeof createAppRouter>;
