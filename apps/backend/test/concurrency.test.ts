import { describe, expect, it } from "vitest";

import { KeyedLock } from "../src/lib/concurrency/keyed-lock";
import { PriorityWorkerPool, QueueFullError } from "../src/lib/concurrency/priority-pool";
import { deferred } from "./helpers";

describe("KeyedLock", () => {
  it("serializes work on the same key", async () => {
    const lock = new KeyedLock(8);
    const gate = deferred();
    const order: string[] = [];

    const first = lock.runExclusive("/weather-tool", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.runExclusive("/weather-tool", async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(lock.isBusy("/weather-tool")).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.isBusy("/weather-tool")).toBe(false);
  });

  it("lets keys on different shards run concurrently", async () => {
    const lock = new KeyedLock(4);
    const other = Array.from({ length: 32 }, (_, i) => `key-${i}`).find(
      (key) => lock.shardOf(key) !== lock.shardOf("a"),
    );
    expect(other).toBeDefined();

    const gate = deferred();
    const blocked = lock.runExclusive("a", () => gate.promise);
    const result = await lock.runExclusive(other ?? "b", async () => "ran");

    expect(result).toBe("ran");
    gate.resolve();
    await blocked;
  });

  it("keeps going after a task fails", async () => {
    const lock = new KeyedLock(1);
    await expect(
      lock.runExclusive("x", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.runExclusive("x", async () => 42)).resolves.toBe(42);
  });

  it("maps a key to the same shard every time", () => {
    const lock = new KeyedLock(64);
    expect(lock.shardOf("/finance-tool")).toBe(lock.shardOf("/finance-tool"));
    expect(lock.shardOf("/finance-tool")).toBeLessThan(64);
  });

  it("rejects a non-positive shard count", () => {
    expect(() => new KeyedLock(0)).toThrow("Shard count must be a positive integer, got 0");
  });
});

describe("PriorityWorkerPool", () => {
  it("starts queued query work before background work", async () => {
    const pool = new PriorityWorkerPool({ concurrency: 1, queueLimit: 10 });
    const gate = deferred();
    const order: string[] = [];

    const blocker = pool.run(() => gate.promise);
    const background = pool.run(async () => order.push("background"), "background");
    const query = pool.run(async () => order.push("query"), "query");

    expect(pool.getStatus()).toEqual({ active: 1, queued: { query: 1, background: 1 } });
    gate.resolve();
    await Promise.all([blocker, background, query]);

    expect(order).toEqual(["query", "background"]);
    expect(pool.getStatus()).toEqual({ active: 0, queued: { query: 0, background: 0 } });
  });

  it("rejects work when a lane is full", async () => {
    const pool = new PriorityWorkerPool({ concurrency: 1, queueLimit: 1 });
    const gate = deferred();

    const blocker = pool.run(() => gate.promise);
    const queued = pool.run(async () => "queued");
    const rejected = pool.run(async () => "rejected");

    await expect(rejected).rejects.toBeInstanceOf(QueueFullError);
    // the query lane has its own cap
    const query = pool.run(async () => "query", "query");

    gate.resolve();
    await expect(Promise.all([blocker, queued, query])).resolves.toEqual([
      undefined,
      "queued",
      "query",
    ]);
  });

  it("propagates task errors", async () => {
    const pool = new PriorityWorkerPool({ concurrency: 2, queueLimit: 2 });
    await expect(
      pool.run(async () => {
        throw new Error("task failed");
      }),
    ).rejects.toThrow("task failed");
    expect(pool.getStatus().active).toBe(0);
  });
});
