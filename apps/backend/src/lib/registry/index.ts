/**
 * Registry Module
 *
 * Entity Store, persistence port and the domain types shared with discovery.
 */

export { EntityStore } from "./entity-store";
export type { StoreSnapshot } from "./entity-store";
export { createMemoryEntityRepository } from "./entity-repository";
export type { EntityRepository } from "./entity-repository";
export * from "./errors";
export * from "./metadata";
export { draftFromRegistration, toolManifestFromMcpTools } from "./registration";
export * from "./types";
