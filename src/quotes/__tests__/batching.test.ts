import { describe, it, expect } from "vitest";
import { chunk, mapWithConcurrency } from "../batching.js";

describe("chunk()", () => {
  it("splits into contiguous chunks with a short tail", () => {
    const items = Array.from({ length: 10 }, (_, i) => i);
    expect(chunk(items, 3)).toEqual([[0, 1, 2], [3, 4, 5], [6, 7, 8], [9]]);
  });

  it("covers every element exactly once, in order", () => {
    const items = Array.from({ length: 2000 }, (_, i) => `S${i}`);
    const chunks = chunk(items, 860);
    expect(chunks.map((c) => c.length)).toEqual([860, 860, 280]);
    expect(chunks.flat()).toEqual(items);
  });

  it("returns no chunks for an empty list", () => {
    expect(chunk([], 5)).toEqual([]);
  });

  it.each([0, -1, 2.5])("rejects size %s", (size) => {
    expect(() => chunk([1, 2], size)).toThrow(RangeError);
  });
});

describe("mapWithConcurrency()", () => {
  it("keeps results in input order regardless of completion order", async () => {
    const delays = [30, 5, 20, 1];
    const out = await mapWithConcurrency(delays, 4, async (ms, i) => {
      await new Promise((r) => setTimeout(r, ms));
      return i * 10;
    });
    expect(out).toEqual([0, 10, 20, 30]);
  });

  it("never has more than `limit` calls in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency(Array.from({ length: 12 }, (_, i) => i), 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((r) => setTimeout(r, 2));
      inFlight--;
    });
    expect(peak).toBe(3);
  });

  it.each([0, -2, 1.5, Number.NaN])("rejects concurrency limit %s", async (limit) => {
    await expect(mapWithConcurrency([1, 2], limit, async (n) => n)).rejects.toThrow(RangeError);
  });

  it("handles an empty input", async () => {
    expect(await mapWithConcurrency([], 8, async () => 1)).toEqual([]);
  });

  it("rethrows a rejection after the other workers settle", async () => {
    const finished: number[] = [];
    const run = mapWithConcurrency([0, 1, 2], 3, async (n) => {
      if (n === 0) throw new Error("batch 0 failed");
      await new Promise((r) => setTimeout(r, 5));
      finished.push(n);
      return n;
    });
    await expect(run).rejects.toThrow("batch 0 failed");
    expect(finished.sort()).toEqual([1, 2]);
  });
});
