import { describe, expect, it } from "vitest";
import { runWithConcurrency, withTimeout } from "../src/application/services/concurrency";
import { ProviderTimeoutError } from "../src/domain/errors/pipeline.errors";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("runWithConcurrency", () => {
  it("keeps task order whatever the completion order", async () => {
    const delays = [30, 5, 20, 0, 10];
    const tasks = delays.map((ms, i) => async () => {
      await delay(ms);
      return i;
    });

    expect(await runWithConcurrency(tasks, 3)).toEqual([0, 1, 2, 3, 4]);
  });

  it("never runs more than the worker count at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const tasks = Array.from({ length: 8 }, () => async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
    });

    await runWithConcurrency(tasks, 2);

    expect(peak).toBe(2);
  });

  it("reports progress after each task", async () => {
    const seen: Array<[number, number]> = [];
    await runWithConcurrency(
      [async () => 1, async () => 2, async () => 3],
      1,
      (completed, total) => seen.push([completed, total])
    );

    expect(seen).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it("handles an empty task list", async () => {
    expect(await runWithConcurrency([], 4)).toEqual([]);
  });
});

describe("withTimeout", () => {
  it("resolves with the operation result in time", async () => {
    await expect(withTimeout(async () => "done", 100, "Quick call")).resolves.toBe("done");
  });

  it("rejects with ProviderTimeoutError and aborts the operation", async () => {
    let aborted = false;
    const operation = (signal: AbortSignal) =>
      new Promise<string>((resolve) => {
        signal.addEventListener("abort", () => {
          aborted = true;
        });
        setTimeout(() => resolve("late"), 200);
      });

    const result = withTimeout(operation, 10, "Slow call");

    await expect(result).rejects.toBeInstanceOf(ProviderTimeoutError);
    await expect(result).rejects.toThrow("Slow call timed out after 10ms");
    expect(aborted).toBe(true);
  });

  it("passes operation errors through", async () => {
    await expect(
      withTimeout(async () => {
        throw new Error("boom");
      }, 100, "Failing call")
    ).rejects.toThrow("boom");
  });
});
