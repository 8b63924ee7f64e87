import { describe, it, expect } from "vitest";
import { runPool } from "../src/pool.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("runPool", () => {
  it("returns results in input order", async () => {
    const results = await runPool(
      [30, 5, 15, 1],
      async (ms, index) => {
        await delay(ms);
        return `${index}:${ms}`;
      },
      { concurrency: 4 }
    );
    expect(results).toEqual(["0:30", "1:5", "2:15", "3:1"]);
  });

  it("never exceeds the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    await runPool(
      Array.from({ length: 10 }, (_, i) => i),
      async () => {
        active++;
        peak = Math.max(peak, active);
        await delay(2);
        active--;
      },
      { concurrency: 3 }
    );
    expect(peak).toBe(3);
  });

  it("handles an empty list", async () => {
    expect(await runPool([], async () => 1, { concurrency: 8 })).toEqual([]);
  });

  it("treats a concurrency below one as one", async () => {
    const order: number[] = [];
    await runPool(
      [1, 2, 3],
      async (n) => {
        order.push(n);
      },
      { concurrency: 0 }
    );
    expect(order).toEqual([1, 2, 3]);
  });

  it("reports progress", async () => {
    const progress: string[] = [];
    await runPool(["a", "b"], async (s) => s, {
      concurrency: 1,
      onProgress: (done, total) => progress.push(`${done}/${total}`),
    });
    expect(progress).toEqual(["1/2", "2/2"]);
  });

  it("rejects with the first task error", async () => {
    await expect(
      runPool(
        [1, 2, 3],
        async (n) => {
          if (n === 2) throw new Error("task 2 failed");
          return n;
        },
        { concurrency: 1 }
      )
    ).rejects.toThrow("task 2 failed");
  });

  it("drops queued items after a failure", async () => {
    const started: number[] = [];
    await expect(
      runPool(
        [1, 2, 3, 4],
        async (n) => {
          started.push(n);
          if (n === 2) throw new Error("task 2 failed");
          return n;
        },
        { concurrency: 1 }
      )
    ).rejects.toThrow("task 2 failed");

    await delay(5);
    expect(started).toEqual([1, 2]);
  });
});
