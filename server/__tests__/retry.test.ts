import { describe, it, expect, vi, afterEach } from "vitest";
import { TimeoutError, isRetryableError, retryWithBackoff, withTimeout } from "../utils/retry";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve("done"), 1000)).resolves.toBe("done");
  });

  it("rejects with TimeoutError when the deadline passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise(() => {}), 500, "Query execution timed out");
    const assertion = expect(pending).rejects.toThrow("Query execution timed out (after 500ms)");
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });
});

describe("isRetryableError", () => {
  it("retries transient failures", () => {
    expect(isRetryableError(new Error("fetch failed"))).toBe(true);
    expect(isRetryableError(new Error("503 Service Unavailable"))).toBe(true);
    expect(isRetryableError(new TimeoutError("slow", 10))).toBe(true);
  });

  it("does not retry caller errors", () => {
    expect(isRetryableError(new Error("Invalid API key"))).toBe(false);
  });
});

describe("retryWithBackoff", () => {
  it("retries retryable errors until one attempt succeeds", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("network down"))
      .mockResolvedValueOnce("ok");

    await expect(retryWithBackoff(fn, "test", { initialDelay: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it("gives up after maxAttempts", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("502 Bad Gateway"));

    await expect(retryWithBackoff(fn, "test", { maxAttempts: 2, initialDelay: 1 })).rejects.toThrow("502 Bad Gateway");
    expect(fn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it("does not retry errors that are not retryable", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("Invalid API key"));

    await expect(retryWithBackoff(fn, "test")).rejects.toThrow("Invalid API key");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
