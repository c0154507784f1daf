/**
 * PromptAssembler - packs prioritized components into one prompt under a token budget.
 *
 * Packing is greedy in priority order. The first component that does not fit
 * ends the pass: it is omitted, and so is everything of lower priority, unless
 * it is a critical component with nothing committed before it, in which case a
 * character-ratio prefix of it is committed instead.
 *
 * Step-wise estimates are not exactly additive, so the joined prompt is
 * re-estimated at the end. If it is still over budget the whole prompt is
 * hard-truncated and the discrepancy is logged as an error.
 */

import type { ILogObj, Logger } from "tslog";
import { type ConversationTurn, renderTurn } from "../core/messages.js";
import { defaultLogger } from "../logging/logger.js";
import { type EstimateTokens, guardEstimator } from "../tokens/estimator.js";
import {
  type HistoryComponent,
  isEmptyComponent,
  type PromptComponent,
  type PromptComponents,
} from "./components.js";
import {
  type AssemblerConfig,
  type ResolvedAssemblerConfig,
  resolveAssemblerConfig,
} from "./config.js";

/**
 * The assembled prompt and how it was put together.
 */
export interface AssembledPrompt {
  text: string;
  /** Estimate of `text`; never above the budget */
  estimatedCost: number;
  /** Committed keys, in priority order */
  included: string[];
  /** Critical keys committed as a cut prefix */
  truncated: string[];
  /** Present keys left out for lack of budget */
  omitted: string[];
  /** Keys in the priority order that were absent or empty */
  skipped: string[];
  /** History turns left out by newest-first packing */
  droppedHistoryTurns: number;
  /** Whether the final hard truncation was applied */
  hardTruncated: boolean;
}

export interface PromptAssemblerOptions extends AssemblerConfig {
  estimate?: EstimateTokens;
  logger?: Logger<ILogObj>;
}

interface FormattedComponent {
  text: string;
  droppedTurns: number;
}

/**
 * @example
 * ```typescript
 * const assembler = new PromptAssembler();
 *
 * const prompt = assembler.assemble(
 *   {
 *     system_message: textComponent("You are a helpful assistant."),
 *     history: historyComponent(history.snapshot()),
 *     user_query: textComponent("What did we decide yesterday?"),
 *   },
 *   4000,
 * );
 * ```
 */
export class PromptAssembler {
  private readonly estimate: EstimateTokens;
  private readonly logger: Logger<ILogObj>;
  private readonly config: ResolvedAssemblerConfig;

  constructor(options: PromptAssemblerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.estimate = guardEstimator(options.estimate, this.logger);
    this.config = resolveAssemblerConfig(options);
  }

  /**
   * Builds the prompt text. See {@link assembleDetailed}.
   */
  assemble(
    components: PromptComponents,
    maxTokens: number,
    priorityOrder: readonly string[] = this.config.priorityOrder,
  ): string {
    return this.assembleDetailed(components, maxTokens, priorityOrder).text;
  }

  /**
   * Builds the prompt and reports which components made it in.
   *
   * Identical inputs always produce identical output.
   */
  assembleDetailed(
    components: PromptComponents,
    maxTokens: number,
    priorityOrder: readonly string[] = this.config.priorityOrder,
  ): AssembledPrompt {
    const budget = Number.isFinite(maxTokens) ? Math.floor(maxTokens) : 0;
    const { separator, criticalKeys } = this.config;

    const committed: string[] = [];
    const result: AssembledPrompt = {
      text: "",
      estimatedCost: 0,
      included: [],
      truncated: [],
      omitted: [],
      skipped: [],
      droppedHistoryTurns: 0,
      hardTruncated: false,
    };

    let runningTotal = 0;
    let stopped = budget <= 0;
    if (stopped) {
      this.logger.warn(`Prompt budget is ${maxTokens}; nothing can be included`);
    }

    const seen = new Set<string>();
    for (const key of priorityOrder) {
      if (seen.has(key)) continue;
      seen.add(key);

      // Inherited properties such as "constructor" count as absent
      const component = Object.hasOwn(components, key) ? components[key] : undefined;
      if (!component || isEmptyComponent(component)) {
        result.skipped.push(key);
        continue;
      }
      if (stopped) {
        result.omitted.push(key);
        continue;
      }

      const formatted = this.format(key, component, runningTotal, budget);
      const cost = formatted ? this.estimate(formatted.text + separator) : Number.POSITIVE_INFINITY;

      if (formatted && runningTotal + cost <= budget) {
        committed.push(formatted.text);
        runningTotal += cost;
        result.included.push(key);
        result.droppedHistoryTurns += formatted.droppedTurns;
        this.logger.debug(`Committed '${key}' (${cost} tokens); running total ${runningTotal}/${budget}`);
        continue;
      }

      stopped = true;
      const remaining = budget - runningTotal;

      if (committed.length === 0 && criticalKeys.has(key)) {
        const source = formatted?.text ?? this.renderWhole(key, component);
        const cut = source.slice(0, Math.floor(remaining * this.config.criticalCharsPerToken));
        if (cut.length > 0) {
          committed.push(cut);
          runningTotal += this.estimate(cut + separator);
          result.included.push(key);
          result.truncated.push(key);
          this.logger.info(`Critical component '${key}' truncated to ${cut.length} chars to fit`);
          continue;
        }
      }

      result.omitted.push(key);
      this.logger.warn(
        `Component '${key}' does not fit (${Number.isFinite(cost) ? cost : "no part"} tokens needed, ${remaining} remaining); omitting it and lower-priority components`,
      );
    }

    for (const key of Object.keys(components)) {
      if (!seen.has(key)) {
        this.logger.debug(`Component '${key}' is not in the priority order; ignored`);
      }
    }

    let text = committed.join(separator + separator).trim();
    let estimatedCost = this.estimate(text);

    if (estimatedCost > budget) {
      this.logger.error(
        `Assembled prompt estimated at ${estimatedCost} tokens exceeds budget ${budget} (component estimates are not additive); hard-truncating`,
      );
      text = this.hardTruncate(text, budget);
      estimatedCost = this.estimate(text);
      result.hardTruncated = true;
    }

    this.logger.info(
      `Prompt assembled: ${estimatedCost}/${budget} tokens, ${text.length} chars, components [${result.included.join(", ")}]`,
    );

    result.text = text;
    result.estimatedCost = estimatedCost;
    return result;
  }

  /**
   * Renders a component for inclusion. History is packed newest-first
   * against the remaining budget; undefined means not even one turn fits.
   */
  private format(
    key: string,
    component: PromptComponent,
    runningTotal: number,
    budget: number,
  ): FormattedComponent | undefined {
    const prefix = this.prefixFor(key);

    switch (component.kind) {
      case "text":
        return { text: prefix + component.text, droppedTurns: 0 };
      case "history":
        return this.packHistory(prefix, component, runningTotal, budget);
    }
  }

  private prefixFor(key: string): string {
    const { prefixes } = this.config;
    return Object.hasOwn(prefixes, key) ? (prefixes[key] ?? "") : "";
  }

  private packHistory(
    prefix: string,
    component: HistoryComponent,
    runningTotal: number,
    budget: number,
  ): FormattedComponent | undefined {
    const { separator } = this.config;
    const rendered = component.turns.map((turn: ConversationTurn) => renderTurn(turn));
    const accepted: string[] = [];

    for (let i = rendered.length - 1; i >= 0; i--) {
      const candidate = prefix + [rendered[i], ...accepted].join(separator);
      if (runningTotal + this.estimate(candidate + separator) > budget) {
        this.logger.info(`History packing stopped; ${i + 1} older turn(s) left out`);
        break;
      }
      accepted.unshift(rendered[i]);
    }

    if (accepted.length === 0) {
      return undefined;
    }

    return {
      text: prefix + accepted.join(separator),
      droppedTurns: rendered.length - accepted.length,
    };
  }

  /**
   * Unpacked rendering, used as the source for a critical cut. For history
   * this is the newest turn.
   */
  private renderWhole(key: string, component: PromptComponent): string {
    const prefix = this.prefixFor(key);
    switch (component.kind) {
      case "text":
        return prefix + component.text;
      case "history": {
        const newest = component.turns[component.turns.length - 1];
        return newest ? prefix + renderTurn(newest) : "";
      }
    }
  }

  /**
   * Cuts the prompt to `budget * hardCharsPerToken` characters; when the
   * estimator still disagrees, bisects for the longest prefix within budget.
   */
  private hardTruncate(text: string, budget: number): string {
    const cut = text.slice(0, Math.floor(budget * this.config.hardCharsPerToken)).trimEnd();
    if (this.estimate(cut) <= budget) {
      this.logger.warn(`Forcefully truncated entire prompt to ${cut.length} chars`);
      return cut;
    }

    let low = 0;
    let high = cut.length;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.estimate(cut.slice(0, mid)) <= budget) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    const prefix = cut.slice(0, low).trimEnd();
    this.logger.warn(`Forcefully truncated entire prompt to ${prefix.length} chars after bisection`);
    return this.estimate(prefix) <= budget ? prefix : "";
  }
}

/**
 * One-shot assembly with default settings.
 *
 * @example
 * ```typescript
 * assemblePrompt(
 *   { system_message: textComponent("S"), user_query: textComponent("Q") },
 *   1,
 *   ["user_query", "system_message"],
 * ); // "Use"
 * ```
 */
export function assemblePrompt(
  components: PromptComponents,
  maxTokens: number,
  priorityOrder?: readonly string[],
  options?: PromptAssemblerOptions,
): string {
  return new PromptAssembler(options).assemble(components, maxTokens, priorityOrder);
}
