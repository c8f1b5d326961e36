import { describe, expect, it, vi } from "vitest";

import {
  type EmbeddingsClient,
  OpenAIEmbeddingProvider,
} from "../src/lib/discovery/embedding-provider";

const clientReturning = (data: Array<{ embedding: number[] }>) => {
  const create = vi.fn<EmbeddingsClient["embeddings"]["create"]>(async () => ({ data }));
  return { client: { embeddings: { create } }, create };
};

describe("OpenAIEmbeddingProvider", () => {
  it("requests one embedding for the configured model", async () => {
    const { client, create } = clientReturning([{ embedding: [0.1, 0.2, 0.3] }]);
    const provider = new OpenAIEmbeddingProvider({
      model: "test-embedding-model",
      dimensions: 3,
      client,
    });
    const controller = new AbortController();

    await expect(provider.embed("get current weather", controller.signal)).resolves.toEqual([
      0.1, 0.2, 0.3,
    ]);
    expect(provider.modelId).toBe("test-embedding-model");
    expect(create).toHaveBeenCalledWith(
      { model: "test-embedding-model", input: "get current weather", dimensions: 3 },
      { signal: controller.signal },
    );
  });

  it("leaves the dimensions to the model when none are configured", async () => {
    const { client, create } = clientReturning([{ embedding: [1] }]);
    await new OpenAIEmbeddingProvider({ client }).embed("weather");

    expect(create).toHaveBeenCalledWith(
      { model: "text-embedding-3-small", input: "weather" },
      { signal: undefined },
    );
  });

  it("rejects an empty response", async () => {
    const { client } = clientReturning([]);
    await expect(
      new OpenAIEmbeddingProvider({ model: "test-embedding-model", client }).embed("weather"),
    ).rejects.toThrow("No embedding returned by test-embedding-model");
  });

  it("fails the call, not construction, when no API key is configured", async () => {
    const provider = new OpenAIEmbeddingProvider();
    await expect(provider.embed("weather")).rejects.toThrow(
      "Embedding API key not configured. Set OPENAI_API_KEY.",
    );
  });
});
