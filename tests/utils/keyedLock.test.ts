import { setTimeout as sleep } from "timers/promises";
import { describe, expect, it } from "vitest";
import { KeyedLock } from "../../src/utils/keyedLock.js";

describe("KeyedLock", () => {
  it("runs work for one key in order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("folder", async () => {
        events.push("first start");
        await sleep(20);
        events.push("first end");
      }),
      lock.run("folder", async () => {
        events.push("second start");
      }),
    ]);

    expect(events).toEqual(["first start", "first end", "second start"]);
  });

  it("does not make other keys wait", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("a", async () => {
        await sleep(20);
        events.push("a");
      }),
      lock.run("b", async () => {
        events.push("b");
      }),
    ]);

    expect(events).toEqual(["b", "a"]);
  });

  it("keeps going after a failure and returns results", async () => {
    const lock = new KeyedLock();

    const failed = lock.run("folder", async () => {
      throw new Error("disk full");
    });
    const next = lock.run("folder", async () => "done");

    await expect(failed).rejects.toThrow("disk full");
    await expect(next).resolves.toBe("done");
  });
});
