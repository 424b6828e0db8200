import { describe, it, expect, vi } from "vitest";
import { createCircuitBreaker } from "./circuit-breaker.js";

describe("createCircuitBreaker", () => {
  it("passes arguments through and resolves with the result", async () => {
    const breaker = createCircuitBreaker("sum", async (a: number, b: number) => a + b);

    await expect(breaker.fire(2, 3)).resolves.toBe(5);
    breaker.shutdown();
  });

  it("opens after failures and short-circuits further calls", async () => {
    const action = vi.fn(async (): Promise<string> => {
      throw new Error("backend down");
    });
    const warn = vi.fn();
    const breaker = createCircuitBreaker(
      "flaky",
      action,
      { volumeThreshold: 1, errorThresholdPercentage: 1 },
      { warn },
    );

    await expect(breaker.fire()).rejects.toThrow("backend down");
    expect(breaker.opened).toBe(true);

    await expect(breaker.fire()).rejects.toThrow("Breaker is open");
    expect(action).toHaveBeenCalledOnce();
    expect(warn).toHaveBeenCalledWith(
      { breaker: "flaky", state: "open" },
      "circuit opened, calls short-circuited",
    );
    breaker.shutdown();
  });
});
