import {
  type CallerScope,
  DiscoverRequestSchema,
  DiscoverResponseSchema,
  DiscoveryStatsResponseSchema,
  ReindexRequestSchema,
  ReindexResponseSchema,
} from "@repo/zod-types";
import { z } from "zod";

import type { DiscoveryService } from "../lib/discovery";
import { NotFoundError, errorMessage } from "../lib/registry";

export const createDiscoveryImplementations = (service: DiscoveryService) => ({
  discover: async (
    input: z.infer<typeof DiscoverRequestSchema>,
    callerScope: CallerScope,
  ): Promise<z.infer<typeof DiscoverResponseSchema>> => {
    // discover() never throws; an unusable query yields empty partitions
    const data = await service.discover(
      input.query,
      callerScope,
      input.maxResults,
      input.entityKinds,
    );
    return { success: true, data };
  },

  reindex: async (
    input: z.infer<typeof ReindexRequestSchema>,
  ): Promise<z.infer<typeof ReindexResponseSchema>> => {
    try {
      const data = await service.reindex(input.target);
      return {
        success: true,
        data,
        message:
          input.target === "all"
            ? "Index rebuilt"
            : `Entity ${input.target} reindexed`,
      };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { success: false, message: error.message };
      }
      console.error("Error reindexing:", error);
      return { success: false, message: errorMessage(error) };
    }
  },

  stats: async (): Promise<z.infer<typeof DiscoveryStatsResponseSchema>> => {
    return { success: true, data: service.getStats() };
  },
});
