import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TimeoutError, withTimeout } from "./timing.js";

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the function's result", async () => {
    await expect(withTimeout(async () => "done", 1000)).resolves.toBe("done");
  });

  it("clears its timer once settled", async () => {
    await withTimeout(async () => "done", 1000);

    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects with TimeoutError after the deadline", async () => {
    const pending = withTimeout(() => new Promise<string>(() => {}), 500);
    const assertion = expect(pending).rejects.toThrow("Operation timed out after 500ms");

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it("exposes the deadline on the error", () => {
    expect(new TimeoutError(250).timeoutMs).toBe(250);
  });

  it("propagates the function's error", async () => {
    await expect(withTimeout(() => Promise.reject(new Error("failed")), 1000)).rejects.toThrow(
      "failed",
    );
  });

  it("settles and clears its timer when the function throws synchronously", async () => {
    const fn = (): Promise<string> => {
      throw new Error("not started");
    };

    await expect(withTimeout(fn, 1000)).rejects.toThrow("not started");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => "never");

    await expect(withTimeout(fn, 1000, controller.signal)).rejects.toThrow("Operation aborted");
    expect(fn).not.toHaveBeenCalled();
  });

  it("rejects when the signal aborts mid-flight", async () => {
    const controller = new AbortController();
    const pending = withTimeout(() => new Promise<string>(() => {}), 1000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toThrow("Operation aborted");
  });
});
