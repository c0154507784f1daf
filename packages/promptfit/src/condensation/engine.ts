/**
 * CondensationEngine - shrinks text or history to a target token count.
 *
 * Uses a pluggable summarizer when one is configured and falls back to
 * deterministic truncation when there is none, when it fails, or when its
 * output overshoots. Truncation is one character-ratio pass plus at most one
 * hard cut: token estimates are approximate and cannot be inverted, so the
 * engine does not iterate towards an exact count.
 */

import type { ILogObj, Logger } from "tslog";
import { toError } from "../core/errors.js";
import { type ConversationTurn, flattenTurns } from "../core/messages.js";
import { defaultLogger } from "../logging/logger.js";
import { type EstimateTokens, guardEstimator } from "../tokens/estimator.js";
import {
  type CondensationConfig,
  type CondensationStrategy,
  type ResolvedCondensationConfig,
  resolveCondensationConfig,
} from "./config.js";
import type { Summarizer } from "./summarizer.js";

export type CondensationSource = string | readonly ConversationTurn[];

export interface CondensationRequest {
  source: CondensationSource;
  targetTokens: number;
  /** Passed to the summarizer to steer what it keeps */
  relevanceHint?: string;
  /** Overrides the engine's default strategy */
  strategy?: CondensationStrategy;
}

/**
 * How the returned text was produced.
 * - 'empty': empty source or non-positive target
 * - 'unchanged': already within target
 * - 'summarized': accepted summarizer output
 * - 'truncated': character-ratio truncation
 * - 'hard-cut': truncation followed by the hard cut
 */
export type CondensationMethod = "empty" | "unchanged" | "summarized" | "truncated" | "hard-cut";

export interface CondensationResult {
  text: string;
  method: CondensationMethod;
  /** Estimate of the flattened source */
  tokensBefore: number;
  /** Estimate of the returned text */
  tokensAfter: number;
}

export interface CondensationEngineOptions extends CondensationConfig {
  summarizer?: Summarizer;
  estimate?: EstimateTokens;
  logger?: Logger<ILogObj>;
}

/**
 * @example
 * ```typescript
 * const engine = new CondensationEngine({ summarizer });
 *
 * const knowledge = await engine.condense(longDocument, 400, {
 *   relevanceHint: "refund policy",
 * });
 * ```
 */
export class CondensationEngine {
  private readonly summarizer?: Summarizer;
  private readonly estimate: EstimateTokens;
  private readonly logger: Logger<ILogObj>;
  private readonly config: ResolvedCondensationConfig;

  constructor(options: CondensationEngineOptions = {}) {
    this.summarizer = options.summarizer;
    this.logger = options.logger ?? defaultLogger;
    this.estimate = guardEstimator(options.estimate, this.logger);
    this.config = resolveCondensationConfig(options, (message) => this.logger.warn(message));
  }

  /**
   * Condenses `source` to at most about `targetTokens` and returns the text.
   */
  async condense(
    source: CondensationSource,
    targetTokens: number,
    options: { relevanceHint?: string; strategy?: CondensationStrategy } = {},
  ): Promise<string> {
    const result = await this.condenseDetailed({ source, targetTokens, ...options });
    return result.text;
  }

  /**
   * Like {@link condense}, reporting how the text was produced.
   */
  async condenseDetailed(request: CondensationRequest): Promise<CondensationResult> {
    const flat = typeof request.source === "string" ? request.source : flattenTurns(request.source);
    const target = Number.isFinite(request.targetTokens) ? Math.floor(request.targetTokens) : 0;

    if (flat.length === 0 || target <= 0) {
      return { text: "", method: "empty", tokensBefore: this.estimate(flat), tokensAfter: 0 };
    }

    const tokensBefore = this.estimate(flat);
    if (tokensBefore <= target) {
      const text = flat.trim();
      return { text, method: "unchanged", tokensBefore, tokensAfter: this.estimate(text) };
    }

    const strategy = request.strategy ?? this.config.defaultStrategy;
    this.logger.info(
      `Condensing ${tokensBefore} tokens to ${target} (strategy: ${strategy})`,
    );

    if (strategy !== "truncate") {
      const summary = await this.trySummarize(flat, target, request.relevanceHint, strategy);
      if (summary !== undefined) {
        const text = summary.trim();
        return { text, method: "summarized", tokensBefore, tokensAfter: this.estimate(text) };
      }
    }

    const truncated = this.truncate(flat, target);
    return { ...truncated, tokensBefore };
  }

  /**
   * Deterministic truncation: a prefix of `targetTokens * truncateCharsPerToken`
   * characters, then, if the estimate is still over target, one hard cut to
   * `targetTokens * hardCharsPerToken` characters.
   */
  truncate(text: string, targetTokens: number): Omit<CondensationResult, "tokensBefore"> {
    if (targetTokens <= 0) {
      return { text: "", method: "empty", tokensAfter: 0 };
    }

    const prefix = text.slice(0, Math.floor(targetTokens * this.config.truncateCharsPerToken));
    const prefixTokens = this.estimate(prefix);
    if (prefixTokens <= targetTokens) {
      const result = prefix.trim();
      this.logger.debug(`Truncated ${text.length} chars to ${result.length}`);
      return { text: result, method: "truncated", tokensAfter: this.estimate(result) };
    }

    const hardCut = text.slice(0, Math.floor(targetTokens * this.config.hardCharsPerToken)).trim();
    const tokensAfter = this.estimate(hardCut);
    this.logger.warn(
      `Truncated text still estimated at ${prefixTokens} tokens (target ${targetTokens}); hard cut to ${hardCut.length} chars (~${tokensAfter} tokens)`,
    );
    return { text: hardCut, method: "hard-cut", tokensAfter };
  }

  /**
   * Returns an acceptable summary, or undefined when truncation should be used.
   */
  private async trySummarize(
    text: string,
    targetTokens: number,
    relevanceHint: string | undefined,
    strategy: CondensationStrategy,
  ): Promise<string | undefined> {
    if (!this.summarizer) {
      if (strategy === "summarize") {
        this.logger.warn("Summarize strategy requested but no summarizer is configured; truncating");
      }
      return undefined;
    }

    let summary: string;
    try {
      summary = await this.summarizer(text, targetTokens, relevanceHint);
    } catch (error) {
      this.logger.warn(`Summarizer failed: ${toError(error).message}; falling back to truncation`);
      return undefined;
    }

    if (typeof summary !== "string") {
      this.logger.warn("Summarizer returned a non-string value; falling back to truncation");
      return undefined;
    }

    const summaryTokens = this.estimate(summary);
    const limit = targetTokens * this.config.overshootFactor;
    if (summaryTokens > limit) {
      this.logger.warn(
        `Summary overshot: ${summaryTokens} tokens > ${limit} allowed (target ${targetTokens}); falling back to truncation`,
      );
      return undefined;
    }

    return summary;
  }
}
