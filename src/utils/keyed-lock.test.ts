import { describe, it, expect } from "vitest";
import { KeyedLock } from "./keyed-lock.ts";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("should run tasks under the same key one after another", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("widgets", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run("widgets", async () => {
      order.push("second");
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(order).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("should not hold up tasks under other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const slow = lock.run("widgets", async () => {
      await gate.promise;
      order.push("widgets");
    });
    await lock.run("gadgets", async () => {
      order.push("gadgets");
    });
    gate.resolve();
    await slow;

    expect(order).toEqual(["gadgets", "widgets"]);
  });

  it("should release the key when a task fails", async () => {
    const lock = new KeyedLock();

    await expect(lock.run("widgets", async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    expect(await lock.run("widgets", async () => 42)).toBe(42);
  });
});
