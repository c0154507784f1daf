/**
 * Configuration for the condensation engine.
 */

import {
  DEFAULT_HARD_CHARS_PER_TOKEN,
  DEFAULT_OVERSHOOT_FACTOR,
  DEFAULT_TRUNCATE_CHARS_PER_TOKEN,
} from "../core/constants.js";
import { assertPositiveRatio } from "../core/errors.js";

/**
 * How a request may shrink its source.
 * - 'auto': summarize when a summarizer is configured, otherwise truncate
 * - 'summarize': summarize; truncation is only the fallback
 * - 'truncate': deterministic truncation only, the summarizer is never called
 */
export type CondensationStrategy = "auto" | "summarize" | "truncate";

export const CONDENSATION_STRATEGIES: readonly CondensationStrategy[] = [
  "auto",
  "summarize",
  "truncate",
];

export interface CondensationConfig {
  /**
   * Summaries estimating above `targetTokens * overshootFactor` are discarded.
   * @default 1.2
   */
  overshootFactor?: number;

  /**
   * Characters kept per target token by the truncation pass.
   * @default 3.5
   */
  truncateCharsPerToken?: number;

  /**
   * Characters kept per target token by the hard cut after truncation.
   * Should be smaller than `truncateCharsPerToken`.
   * @default 3.0
   */
  hardCharsPerToken?: number;

  /**
   * Strategy used when a request does not name one.
   * @default 'auto'
   */
  defaultStrategy?: CondensationStrategy;
}

export type ResolvedCondensationConfig = Required<CondensationConfig>;

export const DEFAULT_CONDENSATION_CONFIG: ResolvedCondensationConfig = {
  overshootFactor: DEFAULT_OVERSHOOT_FACTOR,
  truncateCharsPerToken: DEFAULT_TRUNCATE_CHARS_PER_TOKEN,
  hardCharsPerToken: DEFAULT_HARD_CHARS_PER_TOKEN,
  defaultStrategy: "auto",
};

/**
 * Fills in defaults and validates ratios.
 *
 * @param warn - Receives a message for settings that work but defeat their purpose
 * @throws PromptfitConfigError for non-positive ratios
 */
export function resolveCondensationConfig(
  config: CondensationConfig = {},
  warn?: (message: string) => void,
): ResolvedCondensationConfig {
  const resolved: ResolvedCondensationConfig = {
    overshootFactor: config.overshootFactor ?? DEFAULT_CONDENSATION_CONFIG.overshootFactor,
    truncateCharsPerToken:
      config.truncateCharsPerToken ?? DEFAULT_CONDENSATION_CONFIG.truncateCharsPerToken,
    hardCharsPerToken: config.hardCharsPerToken ?? DEFAULT_CONDENSATION_CONFIG.hardCharsPerToken,
    defaultStrategy: config.defaultStrategy ?? DEFAULT_CONDENSATION_CONFIG.defaultStrategy,
  };

  assertPositiveRatio(resolved.overshootFactor, "overshootFactor");
  assertPositiveRatio(resolved.truncateCharsPerToken, "truncateCharsPerToken");
  assertPositiveRatio(resolved.hardCharsPerToken, "hardCharsPerToken");

  if (resolved.hardCharsPerToken >= resolved.truncateCharsPerToken) {
    warn?.(
      `hardCharsPerToken (${resolved.hardCharsPerToken}) should be less than truncateCharsPerToken (${resolved.truncateCharsPerToken}) to shorten anything`,
    );
  }

  return resolved;
}
