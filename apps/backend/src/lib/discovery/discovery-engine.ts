import type { ReindexSummary } from "@repo/zod-types";

import type { EntityRepository } from "../registry/entity-repository";
import { EntityStore } from "../registry/entity-store";
import { errorMessage } from "../registry/errors";
import type { DiscoveryConfig } from "./config";
import { type HealthStatusSource, DiscoveryService } from "./discovery-service";
import { EmbeddingPipeline } from "./embedding-pipeline";
import { type EmbeddingProvider, OpenAIEmbeddingProvider } from "./embedding-provider";
import { type IndexSnapshotStore, IndexSnapshotFile } from "./index-snapshot";
import { IndexSynchronizer } from "./index-synchronizer";
import { ScopeFilter } from "./scope-filter";
import { VectorIndex } from "./vector-index";

export interface DiscoveryEngineOptions {
  config: Readonly<DiscoveryConfig>;
  repository: EntityRepository;
  /** Defaults to the OpenAI embeddings model named in the config */
  embeddingProvider?: EmbeddingProvider;
  /** Defaults to a JSON file at `config.indexSnapshotPath`; null keeps the index in memory only */
  snapshotStore?: IndexSnapshotStore | null;
  healthSource?: HealthStatusSource;
}

export interface DiscoveryEngine {
  store: EntityStore;
  index: VectorIndex;
  pipeline: EmbeddingPipeline;
  synchronizer: IndexSynchronizer;
  service: DiscoveryService;
  start(): Promise<ReindexSummary>;
  stop(): Promise<void>;
}

/**
 * Wire the store, embedding pipeline, vector index, synchronizer and service
 * together. Nothing is loaded until `start()`.
 */
export function createDiscoveryEngine(options: DiscoveryEngineOptions): DiscoveryEngine {
  const { config } = options;

  const embeddingProvider =
    options.embeddingProvider ??
    new OpenAIEmbeddingProvider({
      model: config.embeddingModel,
      dimensions: config.embeddingDimensions,
      apiKey: config.embeddingApiKey,
      baseURL: config.embeddingBaseUrl,
    });
  const snapshotStore =
    options.snapshotStore === undefined
      ? new IndexSnapshotFile(config.indexSnapshotPath)
      : (options.snapshotStore ?? undefined);

  const store = new EntityStore(options.repository, { lockShards: config.lockShards });
  const pipeline = new EmbeddingPipeline(embeddingProvider, {
    concurrency: config.embeddingConcurrency,
    queueLimit: config.embeddingQueueLimit,
    timeoutMs: config.embeddingTimeoutMs,
    maxRetries: config.embeddingMaxRetries,
    retryBaseMs: config.embeddingRetryBaseMs,
  });
  const index = new VectorIndex(embeddingProvider.modelId);
  const synchronizer = new IndexSynchronizer(
    { store, index, pipeline, snapshotStore },
    { lockShards: config.lockShards, reconcileIntervalMs: config.reconcileIntervalMs },
  );
  const service = new DiscoveryService(
    {
      store,
      synchronizer,
      pipeline,
      scopeFilter: new ScopeFilter(config.publicGroup),
      healthSource: options.healthSource,
    },
    config,
  );

  let started: Promise<ReindexSummary> | null = null;

  return {
    store,
    index,
    pipeline,
    synchronizer,
    service,
    start() {
      started ??= (async () => {
        const startTime = Date.now();
        await store.load();
        await synchronizer.restore();
        const summary = await synchronizer.start();
        console.log(
          `[Discovery] Engine ready in ${Date.now() - startTime}ms ` +
            `(${store.snapshot().entities.size} entities, ${index.size} vectors)`,
        );
        return summary;
      })();
      return started;
    },
    async stop() {
      if (started) {
        await started.catch((error: unknown) => {
          console.warn(`[Discovery] Engine did not start cleanly: ${errorMessage(error)}`);
        });
      }
      await synchronizer.stop();
      started = null;
    },
  };
}
