/**
 * Discovery Module
 *
 * Scoped hybrid search over registered servers, tools and agents, plus the
 * synchronizer that keeps the vector index in step with the registry.
 */

export { loadDiscoveryConfig } from "./config";
export type { DiscoveryConfig } from "./config";
export { createDiscoveryEngine } from "./discovery-engine";
export type { DiscoveryEngine, DiscoveryEngineOptions } from "./discovery-engine";
export { DiscoveryService } from "./discovery-service";
export type { DiscoverOptions, HealthStatusSource } from "./discovery-service";
export { EmbeddingPipeline } from "./embedding-pipeline";
export { DEFAULT_EMBEDDING_MODEL, OpenAIEmbeddingProvider } from "./embedding-provider";
export type { EmbeddingProvider } from "./embedding-provider";
export { IndexSnapshotFile, MemoryIndexSnapshotStore } from "./index-snapshot";
export type { IndexSnapshotStore } from "./index-snapshot";
export { IndexSynchronizer } from "./index-synchronizer";
export type { IndexState } from "./index-synchronizer";
export { ScopeFilter } from "./scope-filter";
export { VectorIndex } from "./vector-index";
