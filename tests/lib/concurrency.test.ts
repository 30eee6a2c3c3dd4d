import { describe, expect, it } from "vitest";
import { runWithConcurrency } from "../../src/lib/concurrency";

describe("runWithConcurrency", () => {
  it("keeps input order when tasks finish out of order", async () => {
    const delays = [30, 5, 15, 1];

    const results = await runWithConcurrency(
      delays,
      (ms, index) => new Promise<string>((resolve) => setTimeout(() => resolve(`${index}:${ms}`), ms)),
      3
    );

    expect(results).toEqual(["0:30", "1:5", "2:15", "3:1"]);
  });

  it("never runs more than the limit at once", async () => {
    let active = 0;
    let peak = 0;

    await runWithConcurrency(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 2));
        active--;
      },
      2
    );

    expect(peak).toBe(2);
  });

  it("handles an empty list", async () => {
    await expect(runWithConcurrency([], async (x: number) => x, 4)).resolves.toEqual([]);
  });
});
