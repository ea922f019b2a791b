import { describe, it, expect } from "vitest";
import { runPool } from "./worker-pool";
import { delay } from "../testing/fakes";

describe("runPool", () => {
  it("never exceeds the concurrency bound", async () => {
    let inFlight = 0;
    let peak = 0;

    await runPool(
      Array.from({ length: 10 }, (_, i) => i),
      async (n) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5 + (n % 3));
        inFlight--;
        return n;
      },
      { concurrency: 3 },
    );

    expect(peak).toBe(3);
  });

  it("keys outcomes by item index regardless of completion order", async () => {
    const outcomes = await runPool(
      [30, 1, 15],
      async (ms, index) => {
        await delay(ms);
        return `item-${index}`;
      },
      { concurrency: 3 },
    );

    expect([...outcomes.keys()].sort()).toEqual([0, 1, 2]);
    expect(outcomes.get(0)).toEqual({ ok: true, value: "item-0" });
    expect(outcomes.get(2)).toEqual({ ok: true, value: "item-2" });
  });

  it("turns a thrown task into a failed outcome and keeps going", async () => {
    const error = new Error("boom");
    const outcomes = await runPool(
      ["a", "b", "c"],
      async (item) => {
        if (item === "b") throw error;
        return item.toUpperCase();
      },
      { concurrency: 1 },
    );

    expect(outcomes.get(1)).toEqual({ ok: false, error });
    expect(outcomes.get(2)).toEqual({ ok: true, value: "C" });
  });

  it("stops dequeuing once the signal is aborted", async () => {
    const controller = new AbortController();
    const started: number[] = [];

    const outcomes = await runPool(
      [0, 1, 2, 3, 4],
      async (n) => {
        started.push(n);
        if (n === 1) controller.abort();
        await delay(1);
        return n;
      },
      { concurrency: 1, signal: controller.signal },
    );

    expect(started).toEqual([0, 1]);
    expect(outcomes.size).toBe(2);
  });

  it("runs nothing for an empty list", async () => {
    const outcomes = await runPool([], async () => 1, { concurrency: 4 });
    expect(outcomes.size).toBe(0);
  });

  it.each([0, -1, 1.5])("rejects concurrency %d", async (concurrency) => {
    await expect(
      runPool([1], async (n) => n, { concurrency }),
    ).rejects.toThrow(RangeError);
  });
});
