/**
 * Timing helpers for collaborators that wrap slow calls.
 *
 * @module utils/timing
 */

/**
 * Raised by {@link withTimeout} when the deadline passes first.
 */
export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs an async function with a deadline.
 *
 * The function keeps running after a timeout (there is nothing to cancel it
 * with); its late result or error is ignored.
 *
 * @param fn - Async function to execute
 * @param timeoutMs - Deadline in milliseconds
 * @param signal - Optional AbortSignal for early cancellation
 * @throws TimeoutError when the deadline passes
 *
 * @example
 * ```typescript
 * const summary = await withTimeout(() => model.complete(prompt), 10_000);
 * ```
 */
export function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("Operation aborted"));
      return;
    }

    let settled = false;
    const settle = (finish: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
      finish();
    };

    const onAbort = () => settle(() => reject(new Error("Operation aborted")));
    signal?.addEventListener("abort", onAbort, { once: true });

    const timeoutId = setTimeout(() => settle(() => reject(new TimeoutError(timeoutMs))), timeoutMs);

    // A synchronous throw from fn settles like a rejection
    Promise.resolve()
      .then(fn)
      .then(
        (result) => settle(() => resolve(result)),
        (error: unknown) => settle(() => reject(error)),
      );
  });
}
