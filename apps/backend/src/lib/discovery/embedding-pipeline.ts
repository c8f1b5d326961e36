import {
  PriorityWorkerPool,
  QueueFullError,
  type TaskPriority,
} from "../concurrency/priority-pool";
import { EmbeddingUnavailableError, errorMessage } from "../registry/errors";
import type { EmbeddingProvider } from "./embedding-provider";
import { normalizeVector } from "./vector-index";

export interface EmbeddingPipelineOptions {
  concurrency: number;
  queueLimit: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
}

class EmbeddingTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Embedding timed out after ${timeoutMs}ms`);
    this.name = "EmbeddingTimeoutError";
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs embedding requests through a bounded, prioritized worker pool.
 *
 * Discovery queries use the "query" lane and overtake background re-embedding.
 * Each attempt is bounded by a timeout and retried with exponential backoff;
 * when every attempt fails the caller gets an EmbeddingUnavailableError.
 */
export class EmbeddingPipeline {
  private readonly pool: PriorityWorkerPool;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingPipelineOptions,
  ) {
    this.pool = new PriorityWorkerPool({
      concurrency: options.concurrency,
      queueLimit: options.queueLimit,
    });
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  /** Embed `text` and return a unit-length vector. */
  async embedText(text: string, priority: TaskPriority = "background"): Promise<number[]> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.options.maxRetries; attempt++) {
      if (attempt > 0) {
        await sleep(this.options.retryBaseMs * 2 ** (attempt - 1));
      }
      try {
        return normalizeVector(await this.runAttempt(text, priority));
      } catch (error) {
        lastError = error;
        // A full queue will not drain within a retry window
        if (error instanceof QueueFullError) break;
        console.warn(
          `[Embedding] Attempt ${attempt + 1}/${this.options.maxRetries + 1} failed: ${errorMessage(error)}`,
        );
      }
    }

    throw new EmbeddingUnavailableError(
      `Embedding unavailable: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
  }

  getStatus() {
    return this.pool.getStatus();
  }

  /**
   * One provider call on a pool slot. A timeout rejects the caller at once and
   * aborts the call, but the slot is only released once the provider has
   * actually settled.
   */
  private runAttempt(text: string, priority: TaskPriority): Promise<number[]> {
    return new Promise<number[]>((resolve, reject) => {
      const slot = this.pool.run(async () => {
        const controller = new AbortController();
        const timer = setTimeout(() => {
          const error = new EmbeddingTimeoutError(this.options.timeoutMs);
          controller.abort(error);
          reject(error);
        }, this.options.timeoutMs);

        try {
          const vector = await this.provider.embed(text, controller.signal);
          if (vector.length === 0 || vector.some((value) => !Number.isFinite(value))) {
            throw new Error("Provider returned an empty or non-finite vector");
          }
          resolve(vector);
        } finally {
          clearTimeout(timer);
        }
      }, priority);
      void slot.catch(reject);
    });
  }
}
