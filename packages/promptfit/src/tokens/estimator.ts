/**
 * Token cost estimation.
 *
 * Every budget decision in promptfit goes through an {@link EstimateTokens}
 * function. The default is a characters-per-token approximation: it is not
 * accurate for any real model and is meant to be replaced by injecting a
 * real tokenizer through {@link createTokenEstimator}.
 */

import type { ILogObj, Logger } from "tslog";
import { CHARS_PER_TOKEN } from "../core/constants.js";
import { assertPositiveRatio, toError } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";

/**
 * Maps text to a non-negative integer token count.
 */
export type EstimateTokens = (text: string) => number;

/**
 * A real tokenizer supplied by the caller. It may throw or return garbage;
 * the estimator built around it will not.
 */
export type Tokenizer = (text: string) => number;

export interface TokenEstimatorOptions {
  /** Tokenizer to prefer over the character approximation */
  tokenizer?: Tokenizer;
  /**
   * Characters per token for the approximation
   * @default 4
   */
  charsPerToken?: number;
  /** Logger for tokenizer failures */
  logger?: Logger<ILogObj>;
}

// Estimators that already fall back on tokenizer failure
const guardedEstimators = new WeakSet<EstimateTokens>();

/**
 * Default estimate: `ceil(length / 4)`; `estimateTokens("") === 0`.
 *
 * @example
 * ```typescript
 * estimateTokens("Hello");          // 2
 * estimateTokens("This is a test"); // 4
 * ```
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

guardedEstimators.add(estimateTokens);

/**
 * Builds an estimator that uses `tokenizer` when it behaves and the
 * character approximation when it throws or returns a non-finite or
 * negative count. The first failure is logged as a warning, later ones at
 * debug level so a broken tokenizer does not flood the log.
 *
 * @example
 * ```typescript
 * const estimate = createTokenEstimator({
 *   tokenizer: (text) => encoder.encode(text).length,
 *   logger,
 * });
 * estimate("Hello world");
 * ```
 */
export function createTokenEstimator(options: TokenEstimatorOptions = {}): EstimateTokens {
  const charsPerToken = options.charsPerToken ?? CHARS_PER_TOKEN;
  assertPositiveRatio(charsPerToken, "charsPerToken");

  const logger = options.logger ?? defaultLogger;
  const tokenizer = options.tokenizer;
  const fallback = (text: string): number => Math.ceil(text.length / charsPerToken);

  if (!tokenizer) {
    guardedEstimators.add(fallback);
    return fallback;
  }

  let failures = 0;
  const reportFailure = (reason: string): void => {
    failures++;
    const message = `Tokenizer failed (${reason}); using ${charsPerToken} chars/token estimate`;
    if (failures === 1) {
      logger.warn(message);
    } else {
      logger.debug(`${message} [failure #${failures}]`);
    }
  };

  const estimate = (text: string): number => {
    if (text.length === 0) {
      return 0;
    }

    let count: number;
    try {
      count = tokenizer(text);
    } catch (error) {
      reportFailure(toError(error).message);
      return fallback(text);
    }

    if (!Number.isFinite(count) || count < 0) {
      reportFailure(`returned ${count}`);
      return fallback(text);
    }

    return Math.ceil(count);
  };

  guardedEstimators.add(estimate);
  return estimate;
}

/**
 * Makes a caller-supplied cost function safe to budget with: anything not
 * built by {@link createTokenEstimator} is wrapped as a tokenizer, so a
 * throw or a bad count degrades to the character approximation.
 */
export function guardEstimator(
  estimate: EstimateTokens | undefined,
  logger?: Logger<ILogObj>,
): EstimateTokens {
  if (!estimate || guardedEstimators.has(estimate)) {
    return estimate ?? estimateTokens;
  }
  return createTokenEstimator({ tokenizer: estimate, logger });
}

/**
 * Splits text on whitespace into chunks whose estimates stay within
 * `maxTokensPerChunk`. Words are never split, so a single word larger than
 * the limit becomes a chunk of its own.
 *
 * @example
 * ```typescript
 * chunkByTokens("alpha beta gamma delta", 3);
 * // ["alpha beta", "gamma delta"]
 * ```
 */
export function chunkByTokens(
  text: string,
  maxTokensPerChunk: number,
  estimate: EstimateTokens = estimateTokens,
): string[] {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const chunks: string[] = [];
  let current: string[] = [];

  for (const word of words) {
    const candidate = [...current, word].join(" ");
    if (current.length > 0 && estimate(candidate) > maxTokensPerChunk) {
      chunks.push(current.join(" "));
      current = [word];
    } else {
      current.push(word);
    }
  }

  if (current.length > 0) {
    chunks.push(current.join(" "));
  }

  return chunks;
}
