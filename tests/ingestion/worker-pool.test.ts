import { describe, expect, it, vi } from "vitest";

import { KeyedWorkerPool } from "../../packages/ingestion/src/worker-pool";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("keyed worker pool", () => {
  it("never runs more than the concurrency bound", async () => {
    const pool = new KeyedWorkerPool({ concurrency: 2, onTaskError: vi.fn() });
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    gates.forEach((gate, index) => {
      pool.submit(`user:${index}`, async () => {
        started.push(index);
        await gate.promise;
      });
    });

    expect(started).toEqual([0, 1]);
    expect(pool.activeCount).toBe(2);
    expect(pool.pendingCount).toBe(1);

    gates[0].resolve();
    await vi.waitFor(() => expect(started).toEqual([0, 1, 2]));

    gates[1].resolve();
    gates[2].resolve();
    await pool.drain();
    expect(pool.activeCount).toBe(0);
  });

  it("serializes tasks that share a key and lets other keys pass", async () => {
    const pool = new KeyedWorkerPool({ concurrency: 3, onTaskError: vi.fn() });
    const first = deferred();
    const order: string[] = [];

    pool.submit("user:1", async () => {
      order.push("a:start");
      await first.promise;
      order.push("a:end");
    });
    pool.submit("user:1", async () => {
      order.push("b");
    });
    pool.submit("user:2", async () => {
      order.push("c");
    });

    await vi.waitFor(() => expect(order).toContain("c"));
    expect(order).not.toContain("b");

    first.resolve();
    await pool.drain();
    expect(order).toEqual(["a:start", "c", "a:end", "b"]);
  });

  it("reports task failures and keeps going", async () => {
    const onTaskError = vi.fn();
    const pool = new KeyedWorkerPool({ concurrency: 1, onTaskError });
    const ran: string[] = [];

    pool.submit("user:1", async () => {
      throw new Error("handler failed");
    });
    pool.submit("user:2", async () => {
      ran.push("next");
    });
    await pool.drain();

    expect(onTaskError).toHaveBeenCalledWith("user:1", expect.objectContaining({ message: "handler failed" }));
    expect(ran).toEqual(["next"]);
  });

  it("drains immediately when idle", async () => {
    const pool = new KeyedWorkerPool({ concurrency: 1, onTaskError: vi.fn() });
    await expect(pool.drain()).resolves.toBeUndefined();
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => new KeyedWorkerPool({ concurrency: 0, onTaskError: vi.fn() })).toThrowError(
      "Worker pool concurrency must be a positive integer.",
    );
  });
});
