import { z } from "zod";

import { EntityKindEnum, HealthStatusEnum } from "./registry.zod";

// Supplied per request by the auth layer; trusted as already validated
export const CallerScopeSchema = z.object({
  authorizedGroupPaths: z.array(z.string()).default([]),
  isAdmin: z.boolean().default(false),
});

export const DiscoverRequestSchema = z.object({
  query: z.string().max(2000),
  maxResults: z.number().int().min(1).max(50).default(10),
  entityKinds: z.array(EntityKindEnum).default([]),
});

// A derived tool of a server result that also matched the query
export const MatchingToolSchema = z.object({
  entityId: z.string(),
  toolName: z.string(),
  score: z.number(),
  snippet: z.string(),
});

export const ScoredResultSchema = z.object({
  entityId: z.string(),
  entityKind: EntityKindEnum,
  displayName: z.string(),
  score: z.number(),
  snippet: z.string(),
  tags: z.array(z.string()),
  parentServerId: z.string().nullable(),
  health: HealthStatusEnum,
  // servers only
  numTools: z.number().int().min(0).optional(),
  matchingTools: z.array(MatchingToolSchema).optional(),
  // agents only
  skills: z.array(z.string()).optional(),
});

export const DiscoveryResultsSchema = z.object({
  servers: z.array(ScoredResultSchema),
  tools: z.array(ScoredResultSchema),
  agents: z.array(ScoredResultSchema),
});

export const DiscoverResponseSchema = z.object({
  success: z.boolean(),
  data: DiscoveryResultsSchema,
});

export const ReindexRequestSchema = z.object({
  target: z.union([z.literal("all"), z.string().min(1)]),
});

export const ReindexSummarySchema = z.object({
  indexed: z.number().int().min(0),
  removed: z.number().int().min(0),
  unchanged: z.number().int().min(0),
  failed: z.number().int().min(0),
});

export const ReindexResponseSchema = z.object({
  success: z.boolean(),
  data: ReindexSummarySchema.optional(),
  message: z.string().optional(),
});

export const DiscoveryStatsSchema = z.object({
  entities: z.number().int().min(0),
  indexed: z.number().int().min(0),
  stale: z.number().int().min(0),
  byKind: z.object({
    server: z.number().int().min(0),
    tool: z.number().int().min(0),
    agent: z.number().int().min(0),
  }),
});

export const DiscoveryStatsResponseSchema = z.object({
  success: z.boolean(),
  data: DiscoveryStatsSchema,
});

export type CallerScope = z.infer<typeof CallerScopeSchema>;
export type DiscoverRequest = z.infer<typeof DiscoverRequestSchema>;
export type MatchingTool = z.infer<typeof MatchingToolSchema>;
export type ScoredResult = z.infer<typeof ScoredResultSchema>;
export type DiscoveryResults = z.infer<typeof DiscoveryResultsSchema>;
export type DiscoverResponse = z.infer<typeof DiscoverResponseSchema>;
export type ReindexRequest = z.infer<typeof ReindexRequestSchema>;
export type ReindexSummary = z.infer<typeof ReindexSummarySchema>;
export type ReindexResponse = z.infer<typeof ReindexResponseSchema>;
export type DiscoveryStats = z.infer<typeof DiscoveryStatsSchema>;
export type DiscoveryStatsResponse = z.infer<
  typeof DiscoveryStatsResponseSchema
>;
