import { describe, it, expect } from "vitest";

import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";

describe("InMemoryScheduler", () => {
  it("runs tasks once their delay elapses", async () => {
    const scheduler = new InMemoryScheduler();
    const ran: number[] = [];

    scheduler.scheduleTimeout(2_000, () => {
      ran.push(scheduler.now());
    });

    await scheduler.runFor(1_000);
    expect(ran).toEqual([]);
    expect(scheduler.now()).toBe(1_000);

    await scheduler.runFor(1_000);
    expect(ran).toEqual([2_000]);
  });

  it("runs tasks due at the same time in the order they were scheduled", async () => {
    const scheduler = new InMemoryScheduler();
    const ran: string[] = [];

    scheduler.scheduleTimeout(500, () => {
      ran.push("first");
    });
    scheduler.scheduleTimeout(100, () => {
      ran.push("early");
    });
    scheduler.scheduleTimeout(500, () => {
      ran.push("second");
    });

    await scheduler.runFor(500);
    expect(ran).toEqual(["early", "first", "second"]);
  });

  it("processes follow-up tasks scheduled while running", async () => {
    const scheduler = new InMemoryScheduler();
    const ran: number[] = [];

    const repeat = async (): Promise<void> => {
      ran.push(scheduler.now());
      scheduler.scheduleTimeout(500, repeat);
    };
    scheduler.scheduleTimeout(1_000, repeat);

    await scheduler.runFor(2_000);
    expect(ran).toEqual([1_000, 1_500, 2_000]);
    expect(scheduler.pendingCount).toBe(1);
  });

  it("awaits each task before starting the next", async () => {
    const scheduler = new InMemoryScheduler();
    const ran: string[] = [];

    scheduler.scheduleTimeout(10, async () => {
      await Promise.resolve();
      ran.push("slow");
    });
    scheduler.scheduleTimeout(10, () => {
      ran.push("fast");
    });

    await scheduler.runFor(10);
    expect(ran).toEqual(["slow", "fast"]);
  });

  it("never runs a cancelled task", async () => {
    const scheduler = new InMemoryScheduler(100);
    const ran: number[] = [];

    const handle = scheduler.scheduleTimeout(50, () => {
      ran.push(scheduler.now());
    });
    scheduler.cancel(handle);

    await scheduler.runFor(100);
    expect(ran).toEqual([]);
    expect(scheduler.now()).toBe(200);
    expect(scheduler.pendingCount).toBe(0);
  });

  it("rejects negative delays", async () => {
    const scheduler = new InMemoryScheduler();

    expect(() => scheduler.scheduleTimeout(-1, () => undefined)).toThrow(
      "Timeout delay must be non-negative",
    );
    await expect(scheduler.runFor(-1)).rejects.toThrow("Cannot run scheduler backwards in time");
  });
});
