import type { EntityRegistrationInput } from "@repo/zod-types";
import { vi } from "vitest";

import { loadDiscoveryConfig } from "../src/lib/discovery/config";
import { createDiscoveryEngine } from "../src/lib/discovery/discovery-engine";
import type { EmbeddingProvider } from "../src/lib/discovery/embedding-provider";
import { tokenize } from "../src/lib/discovery/hybrid-ranker";
import { MemoryIndexSnapshotStore } from "../src/lib/discovery/index-snapshot";
import { createMemoryEntityRepository } from "../src/lib/registry/entity-repository";
import { draftFromRegistration } from "../src/lib/registry/registration";
import type { EntityDraft, RegisteredEntity } from "../src/lib/registry/types";

/**
 * Deterministic stand-in for a sentence model: one dimension per distinct
 * term, assigned on first sight. Texts sharing terms point in similar
 * directions, texts sharing none are orthogonal.
 */
export class VocabularyEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];
  failing = false;
  /** While set, calls wait on it before answering */
  gate: Promise<void> | null = null;
  maxConcurrent = 0;
  private active = 0;
  private readonly slots = new Map<string, number>();

  constructor(
    readonly modelId = "test-vocabulary",
    private readonly dimension = 1024,
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);
    try {
      if (this.gate) await this.gate;
      if (this.failing) throw new Error("embedding backend offline");

      const vector = new Array<number>(this.dimension).fill(0);
      for (const token of tokenize(text)) {
        const slot = this.slotOf(token);
        vector[slot] = (vector[slot] ?? 0) + 1;
      }
      return vector;
    } finally {
      this.active--;
    }
  }

  private slotOf(token: string): number {
    let slot = this.slots.get(token);
    if (slot === undefined) {
      slot = this.slots.size % this.dimension;
      this.slots.set(token, slot);
    }
    return slot;
  }
}

export const testConfig = (env: Record<string, string> = {}) =>
  loadDiscoveryConfig({
    EMBEDDING_MAX_RETRIES: "1",
    EMBEDDING_RETRY_BASE_MS: "0",
    EMBEDDING_TIMEOUT_MS: "1000",
    INDEX_RECONCILE_INTERVAL_MS: "0",
    ...env,
  });

export function createTestEngine(
  env: Record<string, string> = {},
  snapshotStore = new MemoryIndexSnapshotStore(),
) {
  const provider = new VocabularyEmbeddingProvider();
  const engine = createDiscoveryEngine({
    config: testConfig(env),
    repository: createMemoryEntityRepository(),
    embeddingProvider: provider,
    snapshotStore,
  });
  return { engine, provider, snapshotStore };
}

export const draft = (input: EntityRegistrationInput): EntityDraft =>
  draftFromRegistration(input);

export const toolDraft = (
  id: string,
  description: string,
  overrides: Partial<Omit<Extract<EntityRegistrationInput, { kind: "tool" }>, "kind">> = {},
): EntityDraft =>
  draftFromRegistration({
    kind: "tool",
    id,
    displayName: id.replace(/^\//, ""),
    description,
    ...overrides,
  });

export function silenceConsole() {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** A registered entity as the store would return it, with fixed timestamps. */
export const stamped = (entityDraft: EntityDraft): RegisteredEntity => ({
  ...entityDraft,
  createdAt: new Date(0),
  updatedAt: new Date(0),
});
