import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import {
  type EntityRegistrationInput,
  EntityRegistrationSchema,
  type ToolDefinition,
} from "@repo/zod-types";

import { ValidationError } from "./errors";
import { toMetadataMap } from "./metadata";
import type { EntityDraft } from "./types";

/**
 * Validate a registration payload and turn it into a store draft.
 * Upstream has already checked path uniqueness and URLs; this only enforces
 * the shape.
 */
export function draftFromRegistration(input: EntityRegistrationInput): EntityDraft {
  const parsed = EntityRegistrationSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue ? `${issue.path.join(".") || "entity"}: ${issue.message}` : "Invalid registration",
      { cause: parsed.error },
    );
  }

  const registration = parsed.data;
  const base = {
    id: registration.id,
    displayName: registration.displayName,
    description: registration.description,
    tags: [...new Set(registration.tags)],
    customMetadata: toMetadataMap(registration.customMetadata),
    enabled: registration.enabled,
    ownerGroup: registration.ownerGroup,
    safetyStatus: registration.safetyStatus,
  };

  switch (registration.kind) {
    case "server":
      return { ...base, kind: "server", tools: dedupeTools(registration.tools) };
    case "tool":
      return {
        ...base,
        kind: "tool",
        toolName: registration.toolName ?? registration.displayName,
        parentServerId: null,
      };
    case "agent":
      return {
        ...base,
        kind: "agent",
        skills: registration.skills,
        trustLevel: registration.trustLevel,
        visibility: registration.visibility,
      };
  }
}

// Later manifest entries win when a server lists the same tool twice
function dedupeTools(tools: ToolDefinition[]): ToolDefinition[] {
  const byName = new Map<string, ToolDefinition>();
  for (const tool of tools) byName.set(tool.name, tool);
  return [...byName.values()];
}

/**
 * Convert an MCP `tools/list` result into a server tool manifest.
 */
export function toolManifestFromMcpTools(tools: Tool[]): ToolDefinition[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description ?? tool.title ?? "",
    inputSchema: tool.inputSchema,
  }));
}
