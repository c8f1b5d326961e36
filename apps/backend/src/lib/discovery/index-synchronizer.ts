import type { ReindexSummary } from "@repo/zod-types";

import { KeyedLock } from "../concurrency/keyed-lock";
import type { EntityStore, StoreSnapshot } from "../registry/entity-store";
import {
  ConcurrentModificationError,
  IndexCorruptionError,
  NotFoundError,
  errorMessage,
} from "../registry/errors";
import type { ChangeEvent, RegisteredEntity, ServerEntity } from "../registry/types";
import type { EmbeddingPipeline } from "./embedding-pipeline";
import type { IndexSnapshotStore } from "./index-snapshot";
import { buildIndexableText, hashIndexableText } from "./indexable-text";
import type { VectorIndex } from "./vector-index";

/**
 * Per-entity index lifecycle:
 *
 *   absent -> indexing -> indexed -> stale -> indexing -> indexed
 *   indexed | stale -> removing -> absent
 *
 * A stale entity keeps its last good vector (if it ever had one) until a
 * re-embed succeeds.
 */
export type IndexState = "absent" | "indexing" | "indexed" | "stale" | "removing";

type SyncOutcome = "indexed" | "unchanged" | "removed" | "failed";

const RECONCILE_BATCH_SIZE = 8;
const PERSIST_DEBOUNCE_MS = 1000;

export interface IndexSynchronizerOptions {
  lockShards: number;
  reconcileIntervalMs: number;
}

/** Parent server of a manifest-derived tool, used for its indexable text. */
export function parentServerOf(
  entity: RegisteredEntity,
  snapshot: StoreSnapshot,
): ServerEntity | undefined {
  if (entity.kind !== "tool" || entity.parentServerId === null) return undefined;
  const parent = snapshot.entities.get(entity.parentServerId);
  return parent?.kind === "server" ? parent : undefined;
}

/**
 * Whether an entity belongs in the vector index: enabled and not flagged
 * unsafe. Pending entities stay indexed (the scope filter hides them) so a
 * "safe" verdict makes them discoverable without re-embedding.
 */
export function isIndexable(entity: RegisteredEntity, snapshot: StoreSnapshot): boolean {
  if (!entity.enabled || entity.safetyStatus === "unsafe") return false;
  if (entity.kind === "tool" && entity.parentServerId !== null) {
    const parent = snapshot.entities.get(entity.parentServerId);
    return parent !== undefined && isIndexable(parent, snapshot);
  }
  return true;
}

/**
 * Keeps the Vector Index consistent with the Entity Store.
 *
 * Owns the index: every write goes through here under a per-entity shard
 * lock, so two re-embeds of the same id never overlap while different ids
 * proceed independently.
 */
export class IndexSynchronizer {
  private readonly locks: KeyedLock;
  private readonly stateById = new Map<string, IndexState>();
  private readonly generations = new Map<string, number>();
  private readonly inflight = new Set<Promise<unknown>>();
  private unsubscribe: (() => void) | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private persistTimer: NodeJS.Timeout | null = null;
  private reconcileRun: { force: boolean; promise: Promise<ReindexSummary> } | null = null;
  private dirty = false;

  constructor(
    private readonly deps: {
      store: EntityStore;
      index: VectorIndex;
      pipeline: EmbeddingPipeline;
      snapshotStore?: IndexSnapshotStore;
    },
    private readonly options: IndexSynchronizerOptions,
  ) {
    this.locks = new KeyedLock(options.lockShards);
  }

  get index(): VectorIndex {
    return this.deps.index;
  }

  stateOf(entityId: string): IndexState {
    return this.stateById.get(entityId) ?? (this.deps.index.has(entityId) ? "indexed" : "absent");
  }

  states(): Record<IndexState, number> {
    const counts: Record<IndexState, number> = {
      absent: 0,
      indexing: 0,
      indexed: 0,
      stale: 0,
      removing: 0,
    };
    const ids = new Set([...this.stateById.keys(), ...this.deps.index.ids()]);
    for (const id of ids) counts[this.stateOf(id)]++;
    return counts;
  }

  /**
   * Load the persisted index. A corrupt snapshot is logged and discarded;
   * the reconciliation that follows rebuilds everything from the store.
   */
  async restore(): Promise<void> {
    const { snapshotStore, index } = this.deps;
    if (!snapshotStore) return;

    try {
      const snapshot = await snapshotStore.load();
      if (!snapshot) {
        console.log("[IndexSync] No index snapshot found, starting empty");
        return;
      }
      index.restore(snapshot);
      console.log(`[IndexSync] Restored ${index.size} vectors from snapshot`);
    } catch (error) {
      if (!(error instanceof IndexCorruptionError)) throw error;
      console.warn(`[IndexSync] ${error.message}. Rebuilding index from entity store.`);
      index.clear();
      this.dirty = true;
    }
  }

  /**
   * Subscribe to store changes, run the startup reconciliation and schedule
   * the periodic self-healing sweep.
   */
  async start(): Promise<ReindexSummary> {
    if (!this.unsubscribe) {
      this.unsubscribe = this.deps.store.subscribe((event) => this.handleChange(event));
    }
    const summary = await this.reconcile();

    if (this.options.reconcileIntervalMs > 0 && !this.sweepTimer) {
      this.sweepTimer = setInterval(() => {
        this.reconcile().catch((error: unknown) => {
          console.error(`[IndexSync] Periodic reconciliation failed: ${errorMessage(error)}`);
        });
      }, this.options.reconcileIntervalMs);
      this.sweepTimer.unref();
    }
    return summary;
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.flush();
    if (this.reconcileRun) await this.reconcileRun.promise;
    await this.persist();
  }

  /** Wait for all event-driven index work scheduled so far. */
  async flush(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  /**
   * Bring one entity's index entry in line with the store. With `force` the
   * entity is re-embedded even if its text is unchanged.
   */
  async syncEntity(entityId: string, options: { force?: boolean } = {}): Promise<SyncOutcome> {
    return this.locks.runExclusive(entityId, () => this.syncLocked(entityId, options.force ?? false));
  }

  /** Forced re-embed of a single entity; unknown ids are a NotFoundError. */
  async reindexEntity(entityId: string): Promise<ReindexSummary> {
    if (!this.deps.store.find(entityId)) throw new NotFoundError(entityId);
    const outcome = await this.syncEntity(entityId, { force: true });
    this.schedulePersist();
    return summarize([outcome]);
  }

  /**
   * Idempotent sweep: index every indexable store entity whose vector is
   * missing or out of date, and drop index entries with no indexable store
   * record. A failure on one entity leaves it stale without failing the
   * sweep. Concurrent callers share the in-flight run.
   */
  async reconcile(options: { force?: boolean } = {}): Promise<ReindexSummary> {
    const force = options.force ?? false;
    const running = this.reconcileRun;
    if (running && (running.force || !force)) return running.promise;

    const promise = (async () => {
      if (running) {
        await running.promise.catch((error: unknown) => {
          console.warn(`[IndexSync] Previous reconciliation failed: ${errorMessage(error)}`);
        });
      }
      return this.runReconcile(force);
    })();
    const run = { force, promise };
    this.reconcileRun = run;

    try {
      return await promise;
    } finally {
      if (this.reconcileRun === run) this.reconcileRun = null;
    }
  }

  /** Write the index snapshot if anything changed since the last write. */
  async persist(): Promise<void> {
    if (this.persistTimer) {
      clearTimeout(this.persistTimer);
      this.persistTimer = null;
    }
    const { snapshotStore, index } = this.deps;
    if (!snapshotStore || !this.dirty) return;

    this.dirty = false;
    try {
      await snapshotStore.save(index.toSnapshot());
    } catch (error) {
      this.dirty = true;
      console.error(`[IndexSync] Failed to save index snapshot: ${errorMessage(error)}`);
    }
  }

  private async runReconcile(force: boolean): Promise<ReindexSummary> {
    const startTime = Date.now();
    const snapshot = this.deps.store.snapshot();
    const orphaned = this.deps.index.ids().filter((id) => !snapshot.entities.has(id));
    if (orphaned.length > 0) {
      console.warn(
        `[IndexSync] ${orphaned.length} index entries have no store record, removing them`,
      );
    }

    const ids = [...new Set([...snapshot.entities.keys(), ...this.deps.index.ids()])].sort();
    const outcomes: SyncOutcome[] = [];
    for (let i = 0; i < ids.length; i += RECONCILE_BATCH_SIZE) {
      const batch = ids.slice(i, i + RECONCILE_BATCH_SIZE);
      outcomes.push(...(await Promise.all(batch.map((id) => this.syncEntity(id, { force })))));
    }

    const summary = summarize(outcomes);
    const elapsed = Date.now() - startTime;
    if (summary.indexed > 0 || summary.removed > 0 || summary.failed > 0) {
      console.log(
        `[IndexSync] Reconciled ${ids.length} entities in ${elapsed}ms: ` +
          `${summary.indexed} indexed, ${summary.removed} removed, ` +
          `${summary.unchanged} unchanged, ${summary.failed} failed`,
      );
    }
    await this.persist();
    return summary;
  }

  private generationOf(entityId: string): number {
    return this.generations.get(entityId) ?? 0;
  }

  private handleChange(event: ChangeEvent): void {
    this.generations.set(event.entityId, this.generationOf(event.entityId) + 1);
    if (event.kind === "deleted") this.generations.delete(event.entityId);
    this.track(this.syncEntity(event.entityId));

    // A tool's text includes its server's name, so server edits reach its tools
    if (event.entityKind === "server" && event.kind === "updated") {
      for (const child of this.deps.store.list({ parentServerId: event.entityId })) {
        this.track(this.syncEntity(child.id));
      }
    }
  }

  private track(work: Promise<SyncOutcome>): void {
    const tracked = work
      .then(() => this.schedulePersist())
      .catch((error: unknown) => {
        console.error(`[IndexSync] Index update failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }

  private schedulePersist(): void {
    if (!this.deps.snapshotStore || !this.dirty || this.persistTimer) return;
    this.persistTimer = setTimeout(() => {
      this.persistTimer = null;
      void this.persist();
    }, PERSIST_DEBOUNCE_MS);
    this.persistTimer.unref();
  }

  private async syncLocked(entityId: string, force: boolean): Promise<SyncOutcome> {
    const { store, index, pipeline } = this.deps;
    const snapshot = store.snapshot();
    const entity = snapshot.entities.get(entityId);

    if (!entity || !isIndexable(entity, snapshot)) {
      if (!index.has(entityId)) {
        this.stateById.delete(entityId);
        return "unchanged";
      }
      this.stateById.set(entityId, "removing");
      index.remove(entityId);
      this.stateById.delete(entityId);
      this.dirty = true;
      return "removed";
    }

    const text = buildIndexableText(entity, parentServerOf(entity, snapshot));
    const hash = hashIndexableText(text);
    const existing = index.get(entityId);
    if (!force && existing?.sourceTextHash === hash) {
      this.stateById.set(entityId, "indexed");
      return "unchanged";
    }

    // The previous vector keeps serving queries until the new one lands
    this.stateById.set(entityId, existing ? "stale" : "indexing");
    const generation = this.generationOf(entityId);

    let vector: number[];
    try {
      vector = await pipeline.embedText(text, "background");
    } catch (error) {
      this.stateById.set(entityId, "stale");
      console.warn(
        `[IndexSync] Re-embedding ${entityId} failed, keeping it stale: ${errorMessage(error)}`,
      );
      return "failed";
    }

    // A write that landed while we were embedding supersedes this vector;
    // its own change event queues the follow-up sync behind this one
    const latest = store.snapshot();
    const current = latest.entities.get(entityId);
    const superseded =
      !current ||
      !isIndexable(current, latest) ||
      hashIndexableText(buildIndexableText(current, parentServerOf(current, latest))) !== hash;
    if (superseded) {
      const conflict = new ConcurrentModificationError(
        entityId,
        `Entity ${entityId} changed while it was being embedded (generation ${generation} -> ` +
          `${this.generationOf(entityId)}); keeping the later write`,
      );
      console.warn(`[IndexSync] ${conflict.message}`);
      this.stateById.set(entityId, "stale");
      return "unchanged";
    }

    try {
      index.upsert(entityId, vector, hash);
    } catch (error) {
      this.stateById.set(entityId, "stale");
      console.error(`[IndexSync] Could not index ${entityId}: ${errorMessage(error)}`);
      return "failed";
    }
    this.stateById.set(entityId, "indexed");
    this.dirty = true;
    return "indexed";
  }
}

function summarize(outcomes: readonly SyncOutcome[]): ReindexSummary {
  const summary: ReindexSummary = { indexed: 0, removed: 0, unchanged: 0, failed: 0 };
  for (const outcome of outcomes) summary[outcome]++;
  return summary;
}
