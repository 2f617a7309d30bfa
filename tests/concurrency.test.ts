import { describe, expect, it, vi } from "vitest";
import {
  Channel,
  ChannelClosedError,
  Semaphore,
  runCoordinated,
} from "../src/concurrency";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("Semaphore", () => {
  it("never lets more than `capacity` holders run at once", async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.use(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await delay(2);
          active--;
        }),
      ),
    );

    expect(maxActive).toBe(2);
    expect(active).toBe(0);
  });

  it("releases the permit when the task throws", async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.use(async () => {
        throw new Error("task failed");
      }),
    ).rejects.toThrow("task failed");

    await expect(semaphore.use(async () => "next")).resolves.toBe("next");
  });

  it("rejects an invalid capacity and over-release", () => {
    expect(() => new Semaphore(0)).toThrow(
      "Semaphore capacity must be a positive integer, got 0",
    );
    expect(() => new Semaphore(1).release()).toThrow(
      "Semaphore released more times than acquired",
    );
  });
});

describe("Channel", () => {
  it("delivers buffered values after close, then ends", async () => {
    const channel = new Channel<number>();
    await channel.send(1);
    await channel.send(2);
    channel.close();

    const received: number[] = [];
    for await (const value of channel) {
      received.push(value);
    }

    expect(received).toEqual([1, 2]);
  });

  it("rejects sends after close", async () => {
    const channel = new Channel<string>();
    channel.close();

    await expect(channel.send("late")).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it("holds a sender while the buffer is full", async () => {
    const channel = new Channel<string>(1);
    await channel.send("first");

    let secondSent = false;
    const pending = channel.send("second").then(() => {
      secondSent = true;
    });
    await delay(0);
    expect(secondSent).toBe(false);
    expect(channel.size).toBe(1);

    await expect(channel.receive()).resolves.toEqual({
      value: "first",
      done: false,
    });
    await pending;
    expect(secondSent).toBe(true);
    await expect(channel.receive()).resolves.toEqual({
      value: "second",
      done: false,
    });
  });

  it("wakes a waiting receiver when closed", async () => {
    const channel = new Channel<number>();
    const next = channel.receive();
    channel.close();

    await expect(next).resolves.toEqual({ value: undefined, done: true });
  });
});

describe("runCoordinated", () => {
  it("writes every produced result through a single writer", async () => {
    let writing = 0;
    let maxWriting = 0;
    const written: number[] = [];

    const summary = await runCoordinated({
      items: [1, 2, 3, 4, 5],
      concurrency: 3,
      produce: async (n) => {
        await delay(1);
        return n * 10;
      },
      consume: async (value) => {
        writing++;
        maxWriting = Math.max(maxWriting, writing);
        await delay(1);
        written.push(value);
        writing--;
      },
      onProduceError: vi.fn(),
      onConsumeError: vi.fn(),
    });

    expect(maxWriting).toBe(1);
    expect([...written].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50]);
    expect(summary).toEqual({
      produced: 5,
      written: 5,
      failed: 0,
      notStarted: 0,
      aborted: false,
    });
  });

  it("reports producer and writer errors per item and keeps going", async () => {
    const onProduceError = vi.fn();
    const onConsumeError = vi.fn();

    const summary = await runCoordinated({
      items: ["ok", "bad-produce", "bad-write", "skip"],
      concurrency: 2,
      produce: async (item) => {
        if (item === "bad-produce") throw new Error("fetch exploded");
        if (item === "skip") return null;
        return item;
      },
      consume: async (item) => {
        if (item === "bad-write") throw new Error("disk full");
      },
      onProduceError,
      onConsumeError,
    });

    expect(summary).toEqual({
      produced: 2,
      written: 1,
      failed: 2,
      notStarted: 0,
      aborted: false,
    });
    expect(onProduceError).toHaveBeenCalledWith("bad-produce", new Error("fetch exploded"));
    expect(onConsumeError).toHaveBeenCalledWith("bad-write", new Error("disk full"));
  });

  it("starts nothing once the signal has fired", async () => {
    const controller = new AbortController();
    controller.abort();
    const produce = vi.fn(async (n: number) => n);

    const summary = await runCoordinated({
      items: [1, 2, 3],
      concurrency: 2,
      signal: controller.signal,
      produce,
      consume: async () => undefined,
      onProduceError: vi.fn(),
      onConsumeError: vi.fn(),
    });

    expect(produce).not.toHaveBeenCalled();
    expect(summary.notStarted).toBe(3);
    expect(summary.aborted).toBe(true);
  });

  it("lets in-flight producers finish after the signal fires", async () => {
    const controller = new AbortController();
    const written: number[] = [];

    const summary = await runCoordinated({
      items: [1, 2, 3],
      concurrency: 1,
      signal: controller.signal,
      produce: async (n) => {
        controller.abort();
        await delay(1);
        return n;
      },
      consume: async (n) => {
        written.push(n);
      },
      onProduceError: vi.fn(),
      onConsumeError: vi.fn(),
    });

    expect(written).toEqual([1]);
    expect(summary.notStarted).toBe(2);
    expect(summary.aborted).toBe(true);
  });
});
