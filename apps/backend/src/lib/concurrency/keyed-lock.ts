/**
 * Sharded async lock.
 *
 * Keys hash onto a fixed number of shards; work submitted for keys on the same
 * shard runs one at a time in submission order, work on different shards runs
 * concurrently. Two operations on the same key are therefore always
 * serialized, while unrelated keys rarely contend.
 */
export class KeyedLock {
  private tails: Array<Promise<void>>;
  private pending: number[];

  constructor(private readonly shardCount: number = 64) {
    if (!Number.isInteger(shardCount) || shardCount < 1) {
      throw new Error(`Shard count must be a positive integer, got ${shardCount}`);
    }
    this.tails = Array.from({ length: shardCount }, () => Promise.resolve());
    this.pending = new Array<number>(shardCount).fill(0);
  }

  shardOf(key: string): number {
    // FNV-1a
    let hash = 0x811c9dc5;
    for (let i = 0; i < key.length; i++) {
      hash ^= key.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193);
    }
    return (hash >>> 0) % this.shardCount;
  }

  /**
   * Run `task` once every earlier task on the key's shard has settled.
   * The returned promise settles with the task's own result or error.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const shard = this.shardOf(key);
    const previous = this.tails[shard] ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tails[shard] = previous.then(() => current);
    this.pending[shard] = (this.pending[shard] ?? 0) + 1;

    await previous;
    try {
      return await task();
    } finally {
      this.pending[shard] = (this.pending[shard] ?? 1) - 1;
      release();
    }
  }

  /** True when some task holds or waits on the key's shard. */
  isBusy(key: string): boolean {
    return (this.pending[this.shardOf(key)] ?? 0) > 0;
  }
}
