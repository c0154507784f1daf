/**
 * Error types and helpers for promptfit.
 *
 * The budgeted prompt path never throws to its caller; these errors are
 * raised only for invalid configuration at construction time.
 */

/**
 * Base class for errors raised by promptfit.
 */
export class PromptfitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PromptfitError";
  }
}

/**
 * Raised when a component is constructed with options it cannot work with.
 *
 * @example
 * ```typescript
 * try {
 *   new ConversationHistoryStore({ maxTokens: -1 });
 * } catch (error) {
 *   if (error instanceof PromptfitConfigError) {
 *     console.error(error.option, error.message);
 *   }
 * }
 * ```
 */
export class PromptfitConfigError extends PromptfitError {
  constructor(
    message: string,
    public readonly option?: string,
  ) {
    super(option ? `${option}: ${message}` : message);
    this.name = "PromptfitConfigError";
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === "string") return new Error(value);
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

/**
 * Throws PromptfitConfigError unless `value` is a non-negative integer.
 */
export function assertTokenCount(value: number, option: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new PromptfitConfigError(`must be a non-negative integer, got ${value}`, option);
  }
}

/**
 * Throws PromptfitConfigError unless `value` is a finite number greater than zero.
 */
export function assertPositiveRatio(value: number, option: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new PromptfitConfigError(`must be a positive number, got ${value}`, option);
  }
}
