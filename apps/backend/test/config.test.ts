import { describe, expect, it } from "vitest";

import { loadDiscoveryConfig } from "../src/lib/discovery/config";

describe("loadDiscoveryConfig", () => {
  it("falls back to the documented defaults", () => {
    expect(loadDiscoveryConfig({})).toMatchObject({
      vectorWeight: 0.7,
      keywordWeight: 0.3,
      exactNameBoost: 2,
      partialNameBoost: 0.5,
      minSimilarity: 0.2,
      fetchMultiplier: 5,
      maxFetch: 500,
      maxResultsCap: 50,
      publicGroup: "public",
      embeddingModel: "text-embedding-3-small",
      embeddingDimensions: undefined,
      embeddingApiKey: undefined,
      reconcileIntervalMs: 300_000,
      databaseUrl: undefined,
    });
  });

  it("coerces numeric settings from strings", () => {
    const config = loadDiscoveryConfig({
      DISCOVERY_VECTOR_WEIGHT: "0.5",
      EMBEDDING_CONCURRENCY: "4",
      INDEX_RECONCILE_INTERVAL_MS: "0",
    });
    expect(config.vectorWeight).toBe(0.5);
    expect(config.embeddingConcurrency).toBe(4);
    expect(config.reconcileIntervalMs).toBe(0);
  });

  it("reads the embedding endpoint settings", () => {
    const config = loadDiscoveryConfig({
      EMBEDDING_DIMENSIONS: "256",
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:8080/v1",
    });
    expect(config.embeddingDimensions).toBe(256);
    expect(config.embeddingApiKey).toBe("test-secret");
    expect(config.embeddingBaseUrl).toBe("http://localhost:8080/v1");
  });

  it("names the offending variable", () => {
    expect(() => loadDiscoveryConfig({ EMBEDDING_CONCURRENCY: "0" })).toThrow(
      /\[Discovery\] Invalid configuration: EMBEDDING_CONCURRENCY/,
    );
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadDiscoveryConfig({}))).toBe(true);
  });
});
