import { describe, it, expect } from "vitest";
import { ConcurrencyLimiter, KeyedMutex } from "../services/concurrency";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

const flush = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe("ConcurrencyLimiter", () => {
  it("rejects a non-positive or fractional limit", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
  });

  it("keeps at most N tasks in flight", async () => {
    const limiter = new ConcurrencyLimiter(2);
    const gate = deferred();
    let active = 0;
    let maxActive = 0;

    const runs = Array.from({ length: 5 }, (_, i) =>
      limiter.run(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await gate.promise;
        active--;
        return i;
      }),
    );

    await flush();
    expect(limiter.activeCount).toBe(2);
    expect(limiter.pendingCount).toBe(3);

    gate.resolve();
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2, 3, 4]);
    expect(maxActive).toBe(2);
    expect(limiter.activeCount).toBe(0);
  });

  it("frees the slot when a task throws", async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    await expect(limiter.run(async () => "next")).resolves.toBe("next");
  });
});

describe("KeyedMutex", () => {
  it("runs tasks for the same key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("user-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("user-1", async () => {
      order.push("second");
    });

    await flush();
    expect(order).toEqual(["first:start"]);
    expect(mutex.isLocked("user-1")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked("user-1")).toBe(false);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.runExclusive("user-1", async () => {
      await gate.promise;
      order.push("user-1");
    });
    await mutex.runExclusive("user-2", async () => {
      order.push("user-2");
    });

    gate.resolve();
    await blocked;
    expect(order).toEqual(["user-2", "user-1"]);
  });

  it("releases the key after a failing task", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive("user-1", async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    await expect(mutex.runExclusive("user-1", async () => 42)).resolves.toBe(42);
  });
});
