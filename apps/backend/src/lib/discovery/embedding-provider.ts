/**
 * Embedding Provider
 *
 * Turns indexable text and discovery queries into vectors through an
 * OpenAI-compatible embeddings endpoint. The client is created on the first
 * call, so an engine without credentials still starts and serves keyword
 * results.
 */

import OpenAI from "openai";

/**
 * Anything that turns text into a fixed-length vector. Implementations must be
 * deterministic for a given model: the same text always yields the same
 * vector, which is what lets the index skip entities whose text hash is
 * unchanged.
 */
export interface EmbeddingProvider {
  readonly modelId: string;
  /** `signal` aborts when the pipeline gives up on the call */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

/** The slice of the OpenAI client this provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string; dimensions?: number },
      options?: { signal?: AbortSignal },
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  model?: string;
  dimensions?: number;
  apiKey?: string;
  baseURL?: string;
  client?: EmbeddingsClient;
}

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  private client: EmbeddingsClient | null;

  constructor(private readonly options: OpenAIEmbeddingProviderOptions = {}) {
    this.modelId = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.client = options.client ?? null;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const { dimensions } = this.options;
    const response = await this.getClient().embeddings.create(
      {
        model: this.modelId,
        input: text,
        ...(dimensions !== undefined ? { dimensions } : {}),
      },
      { signal },
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new Error(`No embedding returned by ${this.modelId}`);
    }
    return embedding;
  }

  private getClient(): EmbeddingsClient {
    if (this.client) return this.client;

    if (!this.options.apiKey) {
      throw new Error("Embedding API key not configured. Set OPENAI_API_KEY.");
    }
    // Retries and timeouts belong to the embedding pipeline
    this.client = new OpenAI({
      apiKey: this.options.apiKey,
      baseURL: this.options.baseURL,
      maxRetries: 0,
    });
    console.log(`[Embedding] Client ready for ${this.modelId}`);
    return this.client;
  }
}
