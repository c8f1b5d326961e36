/**
 * Discovery Service
 *
 * Answers "which servers, tools and agents fit this request" for a caller,
 * restricted to what the caller's groups may see. Combines vector search over
 * the Vector Index with keyword overlap and name boosts, and falls back to
 * keyword-only ranking when the query cannot be embedded.
 */

import type {
  CallerScope,
  DiscoveryResults,
  DiscoveryStats,
  EntityKind,
  HealthStatus,
  ReindexSummary,
} from "@repo/zod-types";

import type { EntityStore, StoreSnapshot } from "../registry/entity-store";
import { EmbeddingUnavailableError, errorMessage } from "../registry/errors";
import { ENTITY_KINDS } from "../registry/types";
import type { DiscoveryConfig } from "./config";
import type { EmbeddingPipeline } from "./embedding-pipeline";
import {
  type RankCandidate,
  nameBoost,
  partitionResults,
  rank,
  tokenize,
} from "./hybrid-ranker";
import { buildIndexableText } from "./indexable-text";
import { type IndexSynchronizer, parentServerOf } from "./index-synchronizer";
import type { ScopeFilter } from "./scope-filter";
import type { VectorHit } from "./vector-index";

/** Health is tracked elsewhere; discovery only reports it. */
export interface HealthStatusSource {
  healthOf(entityId: string): HealthStatus;
}

export interface DiscoverOptions {
  signal?: AbortSignal;
}

export type DiscoverySettings = Pick<
  DiscoveryConfig,
  | "vectorWeight"
  | "keywordWeight"
  | "exactNameBoost"
  | "partialNameBoost"
  | "minSimilarity"
  | "fetchMultiplier"
  | "maxFetch"
  | "prefilterMaxCandidates"
  | "maxResultsCap"
>;

const DEFAULT_MAX_RESULTS = 10;

const emptyResults = (): DiscoveryResults => ({ servers: [], tools: [], agents: [] });

export class DiscoveryService {
  constructor(
    private readonly deps: {
      store: EntityStore;
      synchronizer: IndexSynchronizer;
      pipeline: EmbeddingPipeline;
      scopeFilter: ScopeFilter;
      healthSource?: HealthStatusSource;
    },
    private readonly settings: DiscoverySettings,
  ) {}

  /**
   * Ranked, scope-filtered results partitioned by kind.
   *
   * An empty `entityKinds` means every kind. Failures on the discovery path
   * are logged and produce empty partitions rather than an error.
   */
  async discover(
    query: string,
    callerScope: CallerScope,
    maxResults: number,
    entityKinds: readonly EntityKind[] = [],
    options: DiscoverOptions = {},
  ): Promise<DiscoveryResults> {
    const queryText = query.trim();
    if (queryText.length === 0 || options.signal?.aborted) return emptyResults();

    const limit = this.clampMaxResults(maxResults);
    const kinds = new Set<EntityKind>(entityKinds.length > 0 ? entityKinds : ENTITY_KINDS);

    try {
      const snapshot = this.deps.store.snapshot();
      const allowedByKind = new Map<EntityKind, Set<string>>();
      for (const kind of kinds) {
        const allowed = this.deps.scopeFilter.allowedIds(callerScope, kind, snapshot);
        if (allowed.size > 0) allowedByKind.set(kind, allowed);
      }
      if (allowedByKind.size === 0) return emptyResults();

      const queryVector = await this.embedQuery(queryText);
      if (options.signal?.aborted) return emptyResults();

      const candidates = new Map<string, RankCandidate>();
      const addCandidate = (entityId: string, similarity: number | null) => {
        if (candidates.has(entityId)) return;
        const entity = snapshot.entities.get(entityId);
        if (!entity) return;
        candidates.set(entityId, {
          entity,
          indexableText: buildIndexableText(entity, parentServerOf(entity, snapshot)),
          similarity,
        });
      };

      for (const allowed of allowedByKind.values()) {
        if (queryVector) {
          for (const hit of this.vectorSearch(queryVector, allowed, limit)) {
            addCandidate(hit.entityId, 1 - hit.distance);
          }
        }
        for (const entityId of this.lexicalCandidates(queryText, allowed, snapshot)) {
          addCandidate(
            entityId,
            queryVector ? this.deps.synchronizer.index.similarity(entityId, queryVector) : null,
          );
        }
      }

      const ranked = rank(queryText, [...candidates.values()], this.settings);
      const healthSource = this.deps.healthSource;
      return partitionResults(
        ranked,
        limit,
        kinds,
        healthSource ? (entityId) => healthSource.healthOf(entityId) : undefined,
      );
    } catch (error) {
      console.error(`[Discovery] Discovery failed for query "${queryText}": ${errorMessage(error)}`);
      return emptyResults();
    }
  }

  /** Force re-embedding of one entity, or of everything with "all". */
  async reindex(target: string): Promise<ReindexSummary> {
    const startTime = Date.now();
    const summary =
      target === "all"
        ? await this.deps.synchronizer.reconcile({ force: true })
        : await this.deps.synchronizer.reindexEntity(target);

    console.log(
      `[Discovery] Reindexed ${target} in ${Date.now() - startTime}ms ` +
        `(${summary.indexed} indexed, ${summary.failed} failed)`,
    );
    return summary;
  }

  getStats(): DiscoveryStats {
    const snapshot = this.deps.store.snapshot();
    const byKind: DiscoveryStats["byKind"] = { server: 0, tool: 0, agent: 0 };
    for (const entity of snapshot.entities.values()) byKind[entity.kind]++;

    return {
      entities: snapshot.entities.size,
      indexed: this.deps.synchronizer.index.size,
      stale: this.deps.synchronizer.states().stale,
      byKind,
    };
  }

  private clampMaxResults(maxResults: number): number {
    if (!Number.isFinite(maxResults)) return Math.min(DEFAULT_MAX_RESULTS, this.settings.maxResultsCap);
    return Math.min(this.settings.maxResultsCap, Math.max(1, Math.floor(maxResults)));
  }

  private async embedQuery(queryText: string): Promise<number[] | null> {
    try {
      return await this.deps.pipeline.embedText(queryText, "query");
    } catch (error) {
      if (!(error instanceof EmbeddingUnavailableError)) throw error;
      console.warn(`[Discovery] Falling back to keyword ranking: ${error.message}`);
      return null;
    }
  }

  /**
   * Nearest allowed entities. Small allowed sets are handed to the index as
   * a filter; large ones over-fetch unfiltered hits and widen the window
   * until `k` allowed hits are found or `maxFetch` is reached.
   */
  private vectorSearch(
    queryVector: readonly number[],
    allowed: ReadonlySet<string>,
    k: number,
  ): VectorHit[] {
    const { index } = this.deps.synchronizer;
    if (allowed.size <= this.settings.prefilterMaxCandidates) {
      return index.query(queryVector, k, allowed);
    }

    let fetch = Math.min(k * this.settings.fetchMultiplier, this.settings.maxFetch);
    for (;;) {
      const hits = index.query(queryVector, fetch);
      const visible = hits.filter((hit) => allowed.has(hit.entityId));
      if (visible.length >= k || hits.length < fetch || fetch >= this.settings.maxFetch) {
        return visible.slice(0, k);
      }
      fetch = Math.min(fetch * 2, this.settings.maxFetch);
    }
  }

  /**
   * Allowed entities the vector search may miss: those sharing a term with
   * the query or named by it, and those with no vector yet.
   */
  private lexicalCandidates(
    queryText: string,
    allowed: ReadonlySet<string>,
    snapshot: StoreSnapshot,
  ): string[] {
    const queryTokens = tokenize(queryText);
    const { index } = this.deps.synchronizer;
    const matches: string[] = [];

    for (const entityId of allowed) {
      const entity = snapshot.entities.get(entityId);
      if (!entity) continue;
      if (!index.has(entityId) || nameBoost(queryText, entity, this.settings) > 0) {
        matches.push(entityId);
        continue;
      }
      if (queryTokens.length === 0) continue;
      const textTokens = new Set(
        tokenize(buildIndexableText(entity, parentServerOf(entity, snapshot))),
      );
      if (queryTokens.some((token) => textTokens.has(token))) matches.push(entityId);
    }
    return matches;
  }
}
