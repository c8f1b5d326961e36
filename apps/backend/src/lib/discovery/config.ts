import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const number = (fallback: number) => z.coerce.number().finite().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const DiscoveryEnvSchema = z.object({
  DISCOVERY_VECTOR_WEIGHT: number(0.7),
  DISCOVERY_KEYWORD_WEIGHT: number(0.3),
  DISCOVERY_EXACT_NAME_BOOST: number(2.0),
  DISCOVERY_PARTIAL_NAME_BOOST: number(0.5),
  DISCOVERY_MIN_SIMILARITY: number(0.2),
  DISCOVERY_FETCH_MULTIPLIER: positiveInt(5),
  DISCOVERY_MAX_FETCH: positiveInt(500),
  DISCOVERY_PREFILTER_MAX_CANDIDATES: positiveInt(1000),
  DISCOVERY_MAX_RESULTS_CAP: positiveInt(50),
  DISCOVERY_PUBLIC_GROUP: z.string().min(1).default("public"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  EMBEDDING_CONCURRENCY: positiveInt(2),
  EMBEDDING_QUEUE_LIMIT: positiveInt(256),
  EMBEDDING_TIMEOUT_MS: positiveInt(10_000),
  EMBEDDING_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  EMBEDDING_RETRY_BASE_MS: z.coerce.number().int().min(0).default(200),
  INDEX_LOCK_SHARDS: positiveInt(64),
  INDEX_RECONCILE_INTERVAL_MS: z.coerce.number().int().min(0).default(300_000),
  INDEX_SNAPSHOT_PATH: z.string().min(1).default("./data/discovery-index.json"),
  DATABASE_URL: z.string().optional(),
});

export interface DiscoveryConfig {
  vectorWeight: number;
  keywordWeight: number;
  exactNameBoost: number;
  partialNameBoost: number;
  /** Hits below this cosine similarity are dropped unless keywords or the name match */
  minSimilarity: number;
  fetchMultiplier: number;
  maxFetch: number;
  /** Above this many allowed ids, vector search over-fetches instead of pre-filtering */
  prefilterMaxCandidates: number;
  maxResultsCap: number;
  publicGroup: string;
  embeddingModel: string;
  /** Requested vector size, for models that can shorten their output */
  embeddingDimensions: number | undefined;
  embeddingApiKey: string | undefined;
  embeddingBaseUrl: string | undefined;
  embeddingConcurrency: number;
  embeddingQueueLimit: number;
  embeddingTimeoutMs: number;
  embeddingMaxRetries: number;
  embeddingRetryBaseMs: number;
  lockShards: number;
  /** 0 disables the periodic reconciliation sweep */
  reconcileIntervalMs: number;
  indexSnapshotPath: string;
  databaseUrl: string | undefined;
}

/**
 * Read discovery settings from the environment (or the given map).
 * Invalid values fail fast with the offending variable named.
 */
export function loadDiscoveryConfig(
  env: Record<string, string | undefined> = process.env,
): Readonly<DiscoveryConfig> {
  const parsed = DiscoveryEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`[Discovery] Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return Object.freeze({
    vectorWeight: e.DISCOVERY_VECTOR_WEIGHT,
    keywordWeight: e.DISCOVERY_KEYWORD_WEIGHT,
    exactNameBoost: e.DISCOVERY_EXACT_NAME_BOOST,
    partialNameBoost: e.DISCOVERY_PARTIAL_NAME_BOOST,
    minSimilarity: e.DISCOVERY_MIN_SIMILARITY,
    fetchMultiplier: e.DISCOVERY_FETCH_MULTIPLIER,
    maxFetch: e.DISCOVERY_MAX_FETCH,
    prefilterMaxCandidates: e.DISCOVERY_PREFILTER_MAX_CANDIDATES,
    maxResultsCap: e.DISCOVERY_MAX_RESULTS_CAP,
    publicGroup: e.DISCOVERY_PUBLIC_GROUP,
    embeddingModel: e.EMBEDDING_MODEL,
    embeddingDimensions: e.EMBEDDING_DIMENSIONS,
    embeddingApiKey: e.OPENAI_API_KEY,
    embeddingBaseUrl: e.OPENAI_BASE_URL,
    embeddingConcurrency: e.EMBEDDING_CONCURRENCY,
    embeddingQueueLimit: e.EMBEDDING_QUEUE_LIMIT,
    embeddingTimeoutMs: e.EMBEDDING_TIMEOUT_MS,
    embeddingMaxRetries: e.EMBEDDING_MAX_RETRIES,
    embeddingRetryBaseMs: e.EMBEDDING_RETRY_BASE_MS,
    lockShards: e.INDEX_LOCK_SHARDS,
    reconcileIntervalMs: e.INDEX_RECONCILE_INTERVAL_MS,
    indexSnapshotPath: e.INDEX_SNAPSHOT_PATH,
    databaseUrl: e.DATABASE_URL,
  });
}
