import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { IndexCorruptionError, errorMessage } from "../registry/errors";
import type { VectorIndexSnapshot } from "./vector-index";

const SnapshotSchema = z.object({
  version: z.literal(1),
  model: z.string(),
  dimension: z.number().int().positive().nullable(),
  records: z.array(
    z.object({
      entityId: z.string().min(1),
      sourceTextHash: z.string().min(1),
      vector: z.array(z.number().finite()).min(1),
    }),
  ),
});

export interface IndexSnapshotStore {
  load(): Promise<VectorIndexSnapshot | null>;
  save(snapshot: VectorIndexSnapshot): Promise<void>;
}

/**
 * On-disk copy of the vector index, kept next to (never instead of) the
 * Entity Store. A missing file means "start empty"; an unreadable one is
 * reported as IndexCorruptionError.
 */
export class IndexSnapshotFile implements IndexSnapshotStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<VectorIndexSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new IndexCorruptionError(
        `Index snapshot ${this.filePath} is not valid JSON: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const parsed = SnapshotSchema.safeParse(json);
    if (!parsed.success) {
      throw new IndexCorruptionError(
        `Index snapshot ${this.filePath} has an unexpected shape`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  async save(snapshot: VectorIndexSnapshot): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    // Write-then-rename so a crash mid-write never leaves a truncated file
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(snapshot), "utf8");
    await rename(tempPath, this.filePath);
  }
}

/** Keeps the snapshot in memory; used by tests and ephemeral deployments. */
export class MemoryIndexSnapshotStore implements IndexSnapshotStore {
  private current: VectorIndexSnapshot | null = null;

  async load(): Promise<VectorIndexSnapshot | null> {
    return this.current ? structuredClone(this.current) : null;
  }

  async save(snapshot: VectorIndexSnapshot): Promise<void> {
    this.current = structuredClone(snapshot);
  }
}
