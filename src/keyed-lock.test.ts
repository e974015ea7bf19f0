import { describe, it, expect } from "vitest";
import { KeyedLock } from "./keyed-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs calls for one key in arrival order", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run("k", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = lock.run("k", () => {
      order.push("second");
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first", "second"]);
  });

  it("does not make other keys wait", async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const blocked = lock.run("a", () => gate.promise);
    await expect(lock.run("b", () => "free")).resolves.toBe("free");

    gate.resolve();
    await blocked;
  });

  it("keeps the chain going after a failure", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("k", () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(lock.run("k", () => 42)).resolves.toBe(42);
  });
});
