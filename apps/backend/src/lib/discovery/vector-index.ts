import { IndexCorruptionError } from "../registry/errors";

export interface EmbeddingRecord {
  entityId: string;
  vector: readonly number[];
  sourceTextHash: string;
}

export interface VectorHit {
  entityId: string;
  /** 1 - cosine similarity; 0 is identical direction */
  distance: number;
}

export type CandidateFilter = ReadonlySet<string> | ((entityId: string) => boolean);

export interface VectorIndexSnapshot {
  version: 1;
  model: string;
  dimension: number | null;
  records: Array<{ entityId: string; sourceTextHash: string; vector: number[] }>;
}

/**
 * Scale a vector to unit length. A zero vector is returned unchanged.
 */
export function normalizeVector(vector: readonly number[]): number[] {
  let norm = 0;
  for (const value of vector) norm += value * value;
  if (norm === 0) return [...vector];
  const scale = 1 / Math.sqrt(norm);
  return vector.map((value) => value * scale);
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

function compareHits(a: VectorHit, b: VectorHit): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  return a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0;
}

/**
 * Exact nearest-neighbour index over unit vectors (inner product = cosine).
 *
 * This is derived state: it can always be rebuilt from the Entity Store and
 * the embedding pipeline. Callers serialize writes per entity id; reads need
 * no lock because each write replaces a record atomically.
 */
export class VectorIndex {
  private records = new Map<string, EmbeddingRecord>();
  private dimension: number | null = null;

  constructor(readonly model: string) {}

  get size(): number {
    return this.records.size;
  }

  get vectorDimension(): number | null {
    return this.dimension;
  }

  has(entityId: string): boolean {
    return this.records.has(entityId);
  }

  get(entityId: string): EmbeddingRecord | undefined {
    return this.records.get(entityId);
  }

  ids(): string[] {
    return [...this.records.keys()].sort();
  }

  upsert(entityId: string, vector: readonly number[], sourceTextHash: string): void {
    if (vector.length === 0) {
      throw new Error(`Cannot index empty vector for ${entityId}`);
    }
    if (this.dimension !== null && vector.length !== this.dimension) {
      throw new Error(
        `Vector for ${entityId} has dimension ${vector.length}, index expects ${this.dimension}`,
      );
    }
    this.dimension = vector.length;
    this.records.set(entityId, {
      entityId,
      vector: Object.freeze(normalizeVector(vector)),
      sourceTextHash,
    });
  }

  remove(entityId: string): boolean {
    const removed = this.records.delete(entityId);
    if (this.records.size === 0) this.dimension = null;
    return removed;
  }

  clear(): void {
    this.records.clear();
    this.dimension = null;
  }

  /** Cosine similarity between a stored entity and a unit query vector. */
  similarity(entityId: string, queryVector: readonly number[]): number | null {
    const record = this.records.get(entityId);
    if (!record || record.vector.length !== queryVector.length) return null;
    return dot(record.vector, queryVector);
  }

  /**
   * Top-k nearest entities to `queryVector`, nearest first, ties broken by
   * id. When `candidateFilter` is given only matching ids are considered.
   */
  query(queryVector: readonly number[], k: number, candidateFilter?: CandidateFilter): VectorHit[] {
    if (k <= 0 || this.records.size === 0) return [];
    if (this.dimension !== null && queryVector.length !== this.dimension) return [];

    const accepts =
      candidateFilter === undefined
        ? () => true
        : typeof candidateFilter === "function"
          ? candidateFilter
          : (entityId: string) => candidateFilter.has(entityId);

    const query = normalizeVector(queryVector);
    const hits: VectorHit[] = [];
    for (const record of this.records.values()) {
      if (!accepts(record.entityId)) continue;
      hits.push({ entityId: record.entityId, distance: 1 - dot(record.vector, query) });
    }

    hits.sort(compareHits);
    return hits.slice(0, k);
  }

  toSnapshot(): VectorIndexSnapshot {
    return {
      version: 1,
      model: this.model,
      dimension: this.dimension,
      records: [...this.records.values()]
        .sort((a, b) => (a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0))
        .map((record) => ({
          entityId: record.entityId,
          sourceTextHash: record.sourceTextHash,
          vector: [...record.vector],
        })),
    };
  }

  /**
   * Replace the index contents with a snapshot. A snapshot built by another
   * model, or whose vectors disagree on dimension, is reported as corruption
   * and leaves the index untouched; the caller then rebuilds from the store.
   */
  restore(snapshot: VectorIndexSnapshot): void {
    if (snapshot.model !== this.model) {
      throw new IndexCorruptionError(
        `Snapshot was built with model "${snapshot.model}", expected "${this.model}"`,
      );
    }
    const dimension = snapshot.dimension ?? snapshot.records[0]?.vector.length ?? null;
    for (const record of snapshot.records) {
      if (record.vector.length !== dimension) {
        throw new IndexCorruptionError(
          `Snapshot record ${record.entityId} has dimension ${record.vector.length}, expected ${dimension}`,
        );
      }
    }

    this.clear();
    for (const record of snapshot.records) {
      this.upsert(record.entityId, record.vector, record.sourceTextHash);
    }
  }
}
