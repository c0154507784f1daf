/**
 * PromptPipeline - wires history, condensation and assembly together.
 *
 * New turns go into the history store. When a prompt is needed, bulky text
 * components are condensed first, then the assembler packs the system
 * message, query, instructions, condensed knowledge and a snapshot of the
 * history under the budget.
 */

import type { ILogObj, Logger } from "tslog";
import { type AssembledPrompt, PromptAssembler } from "../assembly/assembler.js";
import { historyComponent, type PromptComponent, textComponent } from "../assembly/components.js";
import type { AssemblerConfig } from "../assembly/config.js";
import type { CondensationConfig } from "../condensation/config.js";
import { CondensationEngine } from "../condensation/engine.js";
import type { Summarizer } from "../condensation/summarizer.js";
import { COMPONENT_KEYS } from "../core/constants.js";
import { toError } from "../core/errors.js";
import type { MessageRole } from "../core/messages.js";
import { type AddMessageResult, ConversationHistoryStore } from "../history/history-store.js";
import { defaultLogger } from "../logging/logger.js";
import type { ObservabilitySink } from "../logging/observability-sink.js";
import { type EstimateTokens, guardEstimator } from "../tokens/estimator.js";
import {
  type AssemblyEvent,
  type AssemblyStats,
  type PipelineConfig,
  type ResolvedPipelineConfig,
  resolvePipelineConfig,
} from "./config.js";

// Filled by the pipeline itself, never from `extra`
const RESERVED_KEYS: ReadonlySet<string> = new Set<string>(Object.values(COMPONENT_KEYS));

/**
 * Content for one prompt.
 */
export interface PromptInput {
  userQuery: string;
  systemMessage?: string;
  taskInstructions?: string;
  retrievedKnowledge?: string;
  /**
   * Further text components by key; they need a place in the priority order.
   * Built-in keys such as 'history' are ignored with a warning.
   */
  extra?: Readonly<Record<string, string>>;
}

export interface PromptPipelineOptions extends PipelineConfig {
  estimate?: EstimateTokens;
  summarizer?: Summarizer;
  logger?: Logger<ILogObj>;
  /** Source of the 'operational_context' component */
  sink?: ObservabilitySink;
  condensation?: CondensationConfig;
  assembler?: Omit<AssemblerConfig, "priorityOrder">;
}

/**
 * @example
 * ```typescript
 * const pipeline = new PromptPipeline({ maxTokens: 2000, summarizer });
 *
 * pipeline.recordTurn("user", "Where is my order?");
 * pipeline.recordTurn("assistant", "It shipped on Monday.");
 *
 * const prompt = await pipeline.build({
 *   systemMessage: "You are a support agent.",
 *   retrievedKnowledge: longPolicyDocument,
 *   userQuery: "Can I still cancel it?",
 * });
 * send(prompt.text);
 * ```
 */
export class PromptPipeline {
  readonly history: ConversationHistoryStore;
  private readonly condenser: CondensationEngine;
  private readonly assembler: PromptAssembler;
  private readonly config: ResolvedPipelineConfig;
  private readonly logger: Logger<ILogObj>;
  private readonly sink?: ObservabilitySink;

  private totalAssemblies = 0;
  private totalCondensations = 0;
  private totalHardTruncations = 0;
  private lastEstimatedCost = 0;

  constructor(options: PromptPipelineOptions) {
    this.config = resolvePipelineConfig(options);
    this.logger = options.logger ?? defaultLogger;
    this.sink = options.sink;

    const estimate = guardEstimator(options.estimate, this.logger);

    if (this.config.includeOperationalContext && !this.sink) {
      this.logger.warn("includeOperationalContext is set but no sink was given; it will be empty");
    }

    this.history = new ConversationHistoryStore({
      maxTokens: this.config.historyMaxTokens,
      protectedRoles: this.config.protectedRoles,
      estimate,
      logger: this.logger,
    });
    this.condenser = new CondensationEngine({
      ...options.condensation,
      summarizer: options.summarizer,
      estimate,
      logger: this.logger,
    });
    this.assembler = new PromptAssembler({
      ...options.assembler,
      priorityOrder: this.config.priorityOrder,
      estimate,
      logger: this.logger,
    });
  }

  /**
   * Stores a conversation turn, evicting old turns as needed.
   */
  recordTurn(role: MessageRole, content: string): AddMessageResult {
    return this.history.addMessage(role, content);
  }

  /**
   * Condenses, snapshots and assembles one prompt.
   */
  async build(input: PromptInput): Promise<AssembledPrompt> {
    const texts: Record<string, string | undefined> = {};
    for (const [key, text] of Object.entries(input.extra ?? {})) {
      if (RESERVED_KEYS.has(key)) {
        this.logger.warn(`Extra component '${key}' uses a reserved key; ignored`);
        continue;
      }
      texts[key] = text;
    }
    texts[COMPONENT_KEYS.systemMessage] = input.systemMessage;
    texts[COMPONENT_KEYS.userQuery] = input.userQuery;
    texts[COMPONENT_KEYS.taskInstructions] = input.taskInstructions;
    texts[COMPONENT_KEYS.retrievedKnowledge] = input.retrievedKnowledge;

    if (this.config.includeOperationalContext) {
      texts[COMPONENT_KEYS.operationalContext] =
        this.sink?.render(this.config.operationalContextEntries) ?? "";
    }

    const condenseTarget = Math.floor(
      (this.config.maxTokens * this.config.condenseBudgetPercent) / 100,
    );
    const condensed: string[] = [];

    for (const key of this.config.condenseKeys) {
      const text = Object.hasOwn(texts, key) ? texts[key] : undefined;
      if (!text) continue;

      const result = await this.condenser.condenseDetailed({
        source: text,
        targetTokens: condenseTarget,
        relevanceHint: input.userQuery,
      });
      if (result.method !== "unchanged") {
        condensed.push(key);
        this.totalCondensations++;
      }
      texts[key] = result.text;
    }

    const components: Record<string, PromptComponent> = {
      [COMPONENT_KEYS.history]: historyComponent(this.history.snapshot()),
    };
    for (const [key, text] of Object.entries(texts)) {
      if (text !== undefined) {
        components[key] = textComponent(text);
      }
    }

    const prompt = this.assembler.assembleDetailed(components, this.config.maxTokens);

    this.totalAssemblies++;
    if (prompt.hardTruncated) this.totalHardTruncations++;
    this.lastEstimatedCost = prompt.estimatedCost;

    this.emit(
      {
        estimatedCost: prompt.estimatedCost,
        maxTokens: this.config.maxTokens,
        included: prompt.included,
        truncated: prompt.truncated,
        omitted: prompt.omitted,
        condensed,
        hardTruncated: prompt.hardTruncated,
        historyMessages: this.history.size,
      },
      prompt,
    );

    return prompt;
  }

  getStats(): AssemblyStats {
    return {
      totalAssemblies: this.totalAssemblies,
      totalCondensations: this.totalCondensations,
      totalHardTruncations: this.totalHardTruncations,
      lastEstimatedCost: this.lastEstimatedCost,
    };
  }

  private emit(event: AssemblyEvent, prompt: AssembledPrompt): void {
    if (!this.config.onAssembly) return;
    try {
      this.config.onAssembly(event, prompt);
    } catch (error) {
      this.logger.warn(`onAssembly callback error: ${toError(error).message}`);
    }
  }
}
