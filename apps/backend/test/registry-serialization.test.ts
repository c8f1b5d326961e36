import { describe, expect, it } from "vitest";

import { RegistryEntitiesSerializer } from "../src/db/serializers";
import type { DatabaseRegistryEntity } from "../src/db/schema";
import { ValidationError } from "../src/lib/registry/errors";
import { flattenMetadata } from "../src/lib/registry/metadata";
import { draftFromRegistration, toolManifestFromMcpTools } from "../src/lib/registry/registration";
import { draft, stamped } from "./helpers";

describe("draftFromRegistration", () => {
  it("fills defaults and removes duplicate tags and tools", () => {
    const server = draftFromRegistration({
      kind: "server",
      id: "/files",
      displayName: "Files",
      tags: ["storage", "storage", "disk"],
      tools: [
        { name: "read_file", description: "old" },
        { name: "read_file", description: "read a file" },
      ],
    });

    expect(server).toMatchObject({
      kind: "server",
      description: "",
      tags: ["storage", "disk"],
      enabled: true,
      ownerGroup: "public",
      safetyStatus: "unknown",
      tools: [{ name: "read_file", description: "read a file" }],
    });
  });

  it("names the first invalid field", () => {
    expect(() => draftFromRegistration({ kind: "tool", id: " padded", displayName: "x" })).toThrow(
      new ValidationError("id: validation:entityId.whitespace"),
    );
  });

  it("uses the display name as a standalone tool's name", () => {
    expect(
      draftFromRegistration({ kind: "tool", id: "/weather-tool", displayName: "Weather" }),
    ).toMatchObject({ toolName: "Weather", parentServerId: null });
  });
});

describe("toolManifestFromMcpTools", () => {
  it("prefers the description and falls back to the title", () => {
    expect(
      toolManifestFromMcpTools([
        { name: "search", title: "Search", inputSchema: { type: "object" } },
        { name: "fetch", description: "fetch a URL", inputSchema: { type: "object" } },
      ]),
    ).toEqual([
      { name: "search", description: "Search", inputSchema: { type: "object" } },
      { name: "fetch", description: "fetch a URL", inputSchema: { type: "object" } },
    ]);
  });
});

describe("RegistryEntitiesSerializer", () => {
  const agent = stamped(
    draft({
      kind: "agent",
      id: "/analyst",
      displayName: "Revenue Analyst",
      customMetadata: { region: "eu", limits: { rpm: 60 } },
      skills: [{ name: "forecast", description: "forecast revenue" }],
      trustLevel: "verified",
    }),
  );

  it("stores kind-specific fields in details", () => {
    expect(RegistryEntitiesSerializer.toRow(agent)).toMatchObject({
      id: "/analyst",
      kind: "agent",
      custom_metadata: { region: "eu", limits: { rpm: 60 } },
      details: {
        skills: [{ name: "forecast", description: "forecast revenue" }],
        trustLevel: "verified",
        visibility: "public",
      },
      parent_server_id: null,
    });
  });

  it("reads a row back into a tagged entity", () => {
    const row: DatabaseRegistryEntity = {
      id: "/files__read_file",
      kind: "tool",
      display_name: "read_file",
      description: "read a file",
      tags: [],
      custom_metadata: { owners: ["ana"] },
      enabled: true,
      owner_group: "team-a",
      safety_status: "safe",
      details: { toolName: "read_file" },
      parent_server_id: "/files",
      created_at: new Date(0),
      updated_at: new Date(0),
    };

    const entity = RegistryEntitiesSerializer.fromRow(row);
    expect(entity).toMatchObject({ kind: "tool", toolName: "read_file", parentServerId: "/files" });
    expect(flattenMetadata(entity.customMetadata)).toEqual(["owners:ana"]);
  });

  it("summarizes with ISO timestamps", () => {
    expect(RegistryEntitiesSerializer.serializeSummary(agent)).toEqual({
      id: "/analyst",
      kind: "agent",
      displayName: "Revenue Analyst",
      description: "",
      tags: [],
      enabled: true,
      ownerGroup: "public",
      safetyStatus: "unknown",
      parentServerId: null,
      created_at: "1970-01-01T00:00:00.000Z",
      updated_at: "1970-01-01T00:00:00.000Z",
    });
  });
});
