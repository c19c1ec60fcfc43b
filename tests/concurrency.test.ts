import { describe, expect, it } from "vitest";

import { mapWithConcurrency } from "../src/market/concurrency";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("mapWithConcurrency", () => {
  it("keeps input order and caps calls in flight", async () => {
    let inFlight = 0;
    let peak = 0;

    const out = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight -= 1;
      return `done:${ms}`;
    });

    expect(out).toEqual(["done:30", "done:5", "done:20", "done:1", "done:10"]);
    expect(peak).toBe(2);
  });

  it("returns an empty array for no items", async () => {
    await expect(mapWithConcurrency([], 4, async (x: number) => x)).resolves.toEqual([]);
  });

  it("rejects when a call rejects", async () => {
    await expect(
      mapWithConcurrency([1, 2], 1, async (x) => {
        if (x === 2) throw new Error("boom");
        return x;
      })
    ).rejects.toThrow("boom");
  });

  it("rejects a non-finite limit", async () => {
    await expect(mapWithConcurrency([1], Number.NaN, async (x) => x)).rejects.toThrow("Invalid concurrency: NaN");
  });
});
