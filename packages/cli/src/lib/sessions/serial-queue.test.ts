import { RelayError } from "@gitrelay/core";
import { describe, expect, it } from "vitest";
import { createDeferred } from "@/test-utils/fakes";
import { KeyedSerialQueue } from "./serial-queue";

describe("KeyedSerialQueue", () => {
  it("runs tasks on one key in submission order without overlap", async () => {
    const queue = new KeyedSerialQueue();
    const events: string[] = [];
    const gate = createDeferred();

    const first = queue.run("a", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = queue.run("a", async () => {
      events.push("second:start");
      return 2;
    });

    await Promise.resolve();
    expect(queue.size("a")).toBe(2);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
    expect(queue.size("a")).toBe(0);
  });

  it("runs different keys concurrently", async () => {
    const queue = new KeyedSerialQueue();
    const gate = createDeferred();
    const events: string[] = [];

    const blocked = queue.run("a", async () => {
      await gate.promise;
      events.push("a");
    });
    await queue.run("b", async () => {
      events.push("b");
    });

    expect(events).toEqual(["b"]);
    gate.resolve();
    await blocked;
    expect(events).toEqual(["b", "a"]);
  });

  it("keeps going after a failed task", async () => {
    const queue = new KeyedSerialQueue();
    const failed = queue.run("a", async () => {
      throw new Error("boom");
    });
    const next = queue.run("a", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("rejects tasks beyond the waiting limit", async () => {
    const queue = new KeyedSerialQueue({ maxWaiting: 1 });
    const gate = createDeferred();

    const running = queue.run("a", () => gate.promise);
    const waiting = queue.run("a", async () => "waited");
    const rejected = queue.run("a", async () => "never");

    const error = await rejected.catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RelayError);
    if (error instanceof RelayError) {
      expect(error.kind).toBe("ConcurrentBatchRejected");
    }

    const forced = queue.run("a", async () => "forced", { force: true });
    gate.resolve();
    await running;
    expect(await waiting).toBe("waited");
    expect(await forced).toBe("forced");
  });

  it("settled resolves after queued work", async () => {
    const queue = new KeyedSerialQueue();
    const gate = createDeferred();
    let done = false;

    const task = queue.run("a", async () => {
      await gate.promise;
      done = true;
    });
    const settled = queue.settled("a").then(() => done);

    gate.resolve();
    await task;
    expect(await settled).toBe(true);
  });
});
