import { describe, it, expect } from "vitest";
import { KeyedMutex, Mutex, Semaphore } from "../../src/utils/concurrency.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Semaphore", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it("never runs more than capacity tasks at once", async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.use(async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((r) => setTimeout(r, 5));
          active--;
        }),
      ),
    );

    expect(peak).toBe(2);
    expect(semaphore.inUse).toBe(0);
  });

  it("serves waiters in FIFO order", async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const order: number[] = [];
    const waiting = [1, 2, 3].map((n) => semaphore.acquire().then(() => order.push(n)));
    expect(semaphore.pending).toBe(3);

    semaphore.release();
    semaphore.release();
    semaphore.release();
    await Promise.all(waiting);
    expect(order).toEqual([1, 2, 3]);
  });

  it("releases the permit when the task throws", async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.use(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(semaphore.inUse).toBe(0);
  });
});

describe("Mutex", () => {
  it("serializes critical sections", async () => {
    const mutex = new Mutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = mutex.runExclusive(() => {
      events.push("second");
    });

    await Promise.resolve();
    expect(mutex.locked).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.locked).toBe(false);
  });
});

describe("KeyedMutex", () => {
  it("serializes per key but not across keys", async () => {
    const locks = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const a1 = locks.runExclusive("a", async () => {
      await gate.promise;
      events.push("a1");
    });
    const a2 = locks.runExclusive("a", () => {
      events.push("a2");
    });
    const b = locks.runExclusive("b", () => {
      events.push("b");
    });

    await b;
    expect(events).toEqual(["b"]);
    gate.resolve();
    await Promise.all([a1, a2]);
    expect(events).toEqual(["b", "a1", "a2"]);
  });

  it("drops idle keys", async () => {
    const locks = new KeyedMutex();
    await locks.runExclusive("session", () => 1);
    expect(locks.size).toBe(0);
  });
});
