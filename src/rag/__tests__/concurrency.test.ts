import { describe, expect, it } from "vitest";
import { runWithConcurrency } from "../concurrency.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("runWithConcurrency", () => {
  it("never runs more than the limit at once and visits every item", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      seen.push(item);
      active--;
    });

    expect(peak).toBe(3);
    expect(seen.sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("passes the item index", async () => {
    const indices: number[] = [];
    await runWithConcurrency(["a", "b"], 1, async (_item, i) => {
      indices.push(i);
    });
    expect(indices).toEqual([0, 1]);
  });

  it("stops starting items after a failure and rethrows the first error", async () => {
    const started: number[] = [];

    await expect(
      runWithConcurrency([1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 2) throw new Error("item 2 failed");
      }),
    ).rejects.toThrow("item 2 failed");

    expect(started).toEqual([1, 2]);
  });

  it("resolves for an empty list", async () => {
    await expect(runWithConcurrency([], 4, async () => undefined)).resolves.toBeUndefined();
  });
});
