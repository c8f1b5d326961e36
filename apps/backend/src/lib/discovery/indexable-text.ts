import { createHash } from "node:crypto";

import { flattenMetadata } from "../registry/metadata";
import type { RegisteredEntity, ServerEntity } from "../registry/types";

/**
 * Build the text an entity is embedded and keyword-matched against.
 *
 * Deterministic: the same entity content always yields the same string, so
 * its hash can be compared to decide whether re-embedding is needed. Custom
 * metadata is flattened to `key:value` tokens, and a tool carries its parent
 * server's name so a query naming either finds it.
 */
export function buildIndexableText(
  entity: RegisteredEntity,
  parent?: ServerEntity,
): string {
  const lines = [`Name: ${entity.displayName}`, `Description: ${entity.description}`];

  if (entity.tags.length > 0) {
    lines.push(`Tags: ${entity.tags.join(", ")}`);
  }

  switch (entity.kind) {
    case "server":
      if (entity.tools.length > 0) {
        lines.push("Tools:");
        for (const tool of entity.tools) {
          lines.push(`Tool: ${tool.name}. Description: ${tool.description}`);
        }
      }
      break;
    case "tool":
      lines.push(`Tool: ${entity.toolName}`);
      if (parent) lines.push(`Server: ${parent.displayName}`);
      break;
    case "agent":
      if (entity.skills.length > 0) {
        lines.push(`Skills: ${entity.skills.map((skill) => skill.name).join(", ")}`);
        lines.push(
          `Skill Details: ${entity.skills
            .map((skill) => `${skill.name}: ${skill.description}`)
            .join(" | ")}`,
        );
      }
      break;
  }

  const metadata = flattenMetadata(entity.customMetadata);
  if (metadata.length > 0) {
    lines.push(`Metadata: ${metadata.join(" ")}`);
  }

  return lines.join("\n");
}

export function hashIndexableText(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}
