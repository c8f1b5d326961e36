import { beforeEach, describe, expect, it, vi } from "vitest";

import { EmbeddingPipeline } from "../src/lib/discovery/embedding-pipeline";
import type { EmbeddingProvider } from "../src/lib/discovery/embedding-provider";
import { EmbeddingUnavailableError } from "../src/lib/registry/errors";
import { deferred, silenceConsole } from "./helpers";

const options = {
  concurrency: 1,
  queueLimit: 4,
  timeoutMs: 1000,
  maxRetries: 2,
  retryBaseMs: 0,
};

const providerWith = (embed: EmbeddingProvider["embed"]): EmbeddingProvider => ({
  modelId: "test-model",
  embed: vi.fn(embed),
});

describe("EmbeddingPipeline", () => {
  beforeEach(() => {
    silenceConsole();
  });

  it("returns unit-length vectors", async () => {
    const pipeline = new EmbeddingPipeline(providerWith(async () => [3, 4]), options);
    const [x, y] = await pipeline.embedText("weather");
    expect(x).toBeCloseTo(0.6);
    expect(y).toBeCloseTo(0.8);
    expect(pipeline.modelId).toBe("test-model");
  });

  it("retries a failed attempt", async () => {
    let calls = 0;
    const provider = providerWith(async () => {
      calls++;
      if (calls === 1) throw new Error("model still loading");
      return [1, 0];
    });
    const pipeline = new EmbeddingPipeline(provider, options);

    await expect(pipeline.embedText("weather")).resolves.toEqual([1, 0]);
    expect(provider.embed).toHaveBeenCalledTimes(2);
  });

  it("gives up with EmbeddingUnavailableError after the last retry", async () => {
    const provider = providerWith(async () => {
      throw new Error("backend offline");
    });
    const pipeline = new EmbeddingPipeline(provider, options);

    await expect(pipeline.embedText("weather")).rejects.toThrow(
      new EmbeddingUnavailableError("Embedding unavailable: backend offline"),
    );
    expect(provider.embed).toHaveBeenCalledTimes(3);
  });

  it("bounds each attempt with a timeout", async () => {
    const pipeline = new EmbeddingPipeline(
      providerWith(() => new Promise<number[]>(() => undefined)),
      { ...options, timeoutMs: 20, maxRetries: 0 },
    );
    await expect(pipeline.embedText("weather")).rejects.toThrow(
      "Embedding unavailable: Embedding timed out after 20ms",
    );
  });

  it("aborts a timed-out call and keeps its slot until the provider settles", async () => {
    const hung = deferred<number[]>();
    const signals: Array<AbortSignal | undefined> = [];
    const provider = providerWith((text, signal) => {
      signals.push(signal);
      return text === "hung" ? hung.promise : Promise.resolve([1, 0]);
    });
    const pipeline = new EmbeddingPipeline(provider, { ...options, timeoutMs: 20, maxRetries: 0 });

    await expect(pipeline.embedText("hung")).rejects.toThrow(
      "Embedding unavailable: Embedding timed out after 20ms",
    );
    expect(signals[0]?.aborted).toBe(true);

    const next = pipeline.embedText("weather");
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(provider.embed).toHaveBeenCalledTimes(1);

    hung.resolve([0, 1]);
    await expect(next).resolves.toEqual([1, 0]);
    expect(provider.embed).toHaveBeenCalledTimes(2);
  });

  it("rejects vectors with non-finite values", async () => {
    const pipeline = new EmbeddingPipeline(providerWith(async () => [Number.NaN]), {
      ...options,
      maxRetries: 0,
    });
    await expect(pipeline.embedText("weather")).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });
});
