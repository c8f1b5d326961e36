import { z } from "zod";

export const EntityKindEnum = z.enum(["server", "tool", "agent"]);

export const SafetyStatusEnum = z.enum(["safe", "unsafe", "pending", "unknown"]);

export const HealthStatusEnum = z.enum(["healthy", "unhealthy", "unknown"]);

// Arbitrary JSON accepted for custom metadata; converted to a tagged
// representation by the backend before it is stored or indexed.
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const CustomMetadataSchema = z.record(JsonValueSchema);

// Entity ids are registry paths, e.g. "/finance-tool"
const EntityPathSchema = z
  .string()
  .min(1, "validation:entityId.required")
  .max(512)
  .refine((value) => value.trim() === value, "validation:entityId.whitespace");

export const ToolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  inputSchema: z.record(z.unknown()).optional(),
});

export const AgentSkillSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
});

const BaseRegistrationSchema = z.object({
  id: EntityPathSchema,
  displayName: z.string().min(1, "validation:displayName.required"),
  description: z.string().default(""),
  tags: z.array(z.string()).default([]),
  customMetadata: CustomMetadataSchema.default({}),
  enabled: z.boolean().default(true),
  ownerGroup: z.string().default("public"),
  safetyStatus: SafetyStatusEnum.default("unknown"),
});

export const ServerRegistrationSchema = BaseRegistrationSchema.extend({
  kind: z.literal("server"),
  tools: z.array(ToolDefinitionSchema).default([]),
});

export const ToolRegistrationSchema = BaseRegistrationSchema.extend({
  kind: z.literal("tool"),
  toolName: z.string().min(1).optional(),
});

export const AgentRegistrationSchema = BaseRegistrationSchema.extend({
  kind: z.literal("agent"),
  skills: z.array(AgentSkillSchema).default([]),
  trustLevel: z.string().nullable().default(null),
  visibility: z.string().default("public"),
});

export const EntityRegistrationSchema = z.discriminatedUnion("kind", [
  ServerRegistrationSchema,
  ToolRegistrationSchema,
  AgentRegistrationSchema,
]);

export const RegisteredEntitySummarySchema = z.object({
  id: z.string(),
  kind: EntityKindEnum,
  displayName: z.string(),
  description: z.string(),
  tags: z.array(z.string()),
  enabled: z.boolean(),
  ownerGroup: z.string(),
  safetyStatus: SafetyStatusEnum,
  parentServerId: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const RegisterEntityResponseSchema = z.object({
  success: z.boolean(),
  data: RegisteredEntitySummarySchema.optional(),
  message: z.string().optional(),
});

export const EntityIdRequestSchema = z.object({
  id: EntityPathSchema,
});

export const SetEntityEnabledRequestSchema = z.object({
  id: EntityPathSchema,
  enabled: z.boolean(),
});

export const SetSafetyStatusRequestSchema = z.object({
  id: EntityPathSchema,
  safetyStatus: SafetyStatusEnum,
});

export const PutAccessGroupRequestSchema = z.object({
  groupPath: z.string().min(1, "validation:groupPath.required"),
  memberEntityIds: z.array(EntityPathSchema).default([]),
});

export const RegistryMutationResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
});

export type EntityKind = z.infer<typeof EntityKindEnum>;
export type SafetyStatus = z.infer<typeof SafetyStatusEnum>;
export type HealthStatus = z.infer<typeof HealthStatusEnum>;
export type CustomMetadata = z.infer<typeof CustomMetadataSchema>;
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;
export type AgentSkill = z.infer<typeof AgentSkillSchema>;
export type EntityRegistration = z.infer<typeof EntityRegistrationSchema>;
export type EntityRegistrationInput = z.input<typeof EntityRegistrationSchema>;
export type RegisteredEntitySummary = z.infer<
  typeof RegisteredEntitySummarySchema
>;
export type RegisterEntityResponse = z.infer<
  typeof RegisterEntityResponseSchema
>;
export type RegistryMutationResponse = z.infer<
  typeof RegistryMutationResponseSchema
>;
