import {
  type CallerScope,
  DiscoverRequestSchema,
  DiscoverResponseSchema,
  DiscoveryStatsResponseSchema,
  ReindexRequestSchema,
  ReindexResponseSchema,
} from "@repo/zod-types";
import { z } from "zod";

import { adminProcedure, protectedProcedure, router } from "../../trpc";

// Procedure definitions only; the backend supplies the implementations
export const createDiscoveryRouter = (implementations: {
  discover: (
    input: z.infer<typeof DiscoverRequestSchema>,
    callerScope: CallerScope,
  ) => Promise<z.infer<typeof DiscoverResponseSchema>>;
  reindex: (
    input: z.infer<typeof ReindexRequestSchema>,
  ) => Promise<z.infer<typeof ReindexResponseSchema>>;
  stats: () => Promise<z.infer<typeof DiscoveryStatsResponseSchema>>;
}) => {
  return router({
    discover: protectedProcedure
      .input(DiscoverRequestSchema)
      .output(DiscoverResponseSchema)
      .query(async ({ input, ctx }) => {
        return implementations.discover(input, ctx.user.callerScope);
      }),

    // Admin only: forces re-embedding
    reindex: adminProcedure
      .input(ReindexRequestSchema)
      .output(ReindexResponseSchema)
      .mutation(async ({ input }) => {
        return implementations.reindex(input);
      }),

    stats: protectedProcedure
      .output(DiscoveryStatsResponseSchema)
      .query(async () => {
        return implementations.stats();
      }),
  });
};
