import { describe, expect, it, vi } from "vitest";
import { ToolTimeoutError } from "./errors.js";
import { computeBackoff, withRetry, withTimeout } from "./retry.js";

describe("withRetry", () => {
  it("returns the first successful result without retrying", async () => {
    const fn = vi.fn(async () => "ok");
    await expect(withRetry(fn, { maxRetries: 2, backoffMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries up to maxRetries additional attempts and rethrows the last error", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn(async (attempt: number) => {
      throw new Error(`fail ${attempt}`);
    });

    await expect(
      withRetry(fn, { maxRetries: 2, backoffMs: 0, onRetry })
    ).rejects.toThrow("fail 3");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2]);
  });

  it("stops early when shouldRetry rejects the error", async () => {
    const fn = vi.fn(async () => {
      throw new Error("fatal");
    });
    await expect(
      withRetry(fn, { maxRetries: 5, backoffMs: 0 }, () => false)
    ).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("succeeds on a later attempt", async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls < 2) throw new Error("transient");
        return calls;
      },
      { maxRetries: 2, backoffMs: 0 }
    );
    expect(result).toBe(2);
  });
});

describe("computeBackoff", () => {
  it("doubles per attempt and caps at maxBackoffMs", () => {
    const options = { maxRetries: 5, backoffMs: 100, maxBackoffMs: 250 };
    expect(computeBackoff(1, options)).toBe(100);
    expect(computeBackoff(2, options)).toBe(200);
    expect(computeBackoff(3, options)).toBe(250);
  });

  it("is zero when backoff is disabled", () => {
    expect(computeBackoff(3, { maxRetries: 1, backoffMs: 0, jitter: 0.5 })).toBe(0);
  });
});

describe("withTimeout", () => {
  it("resolves when the call finishes in time", async () => {
    await expect(withTimeout(async () => 42, 1000, "fast")).resolves.toBe(42);
  });

  it("rejects with ToolTimeoutError and aborts the signal", async () => {
    let seenSignal: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seenSignal = signal;
        return new Promise<string>(() => undefined);
      },
      20,
      "slow_tool"
    );

    await expect(pending).rejects.toBeInstanceOf(ToolTimeoutError);
    await expect(pending).rejects.toThrow("slow_tool timed out after 20ms");
    expect(seenSignal?.aborted).toBe(true);
  });

  it("does not arm a timer for non-positive timeouts", async () => {
    await expect(withTimeout(async () => "no timer", 0, "x")).resolves.toBe("no timer");
  });
});
