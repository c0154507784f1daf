/**
 * Configuration for the prompt pipeline.
 */

import { COMPONENT_KEYS, DEFAULT_PRIORITY_ORDER } from "../core/constants.js";
import { assertTokenCount, PromptfitConfigError } from "../core/errors.js";
import type { MessageRole } from "../core/messages.js";
import type { AssembledPrompt } from "../assembly/assembler.js";

/**
 * Event emitted after every {@link PromptPipeline.build}.
 */
export interface AssemblyEvent {
  /** Estimated cost of the final prompt */
  estimatedCost: number;
  maxTokens: number;
  included: string[];
  truncated: string[];
  omitted: string[];
  /** Keys that went through the condensation engine */
  condensed: string[];
  hardTruncated: boolean;
  /** Messages stored in the history at build time */
  historyMessages: number;
}

/**
 * Running totals across builds.
 */
export interface AssemblyStats {
  totalAssemblies: number;
  totalCondensations: number;
  totalHardTruncations: number;
  lastEstimatedCost: number;
}

export interface PipelineConfig {
  /** Budget for each assembled prompt */
  maxTokens: number;

  /**
   * Ceiling for the stored conversation history.
   * @default maxTokens
   */
  historyMaxTokens?: number;

  /**
   * Roles the history store never evicts.
   * @default []
   */
  protectedRoles?: readonly MessageRole[];

  /**
   * Priority order for assembly, highest first.
   * @default DEFAULT_PRIORITY_ORDER (plus 'operational_context' last when enabled)
   */
  priorityOrder?: readonly string[];

  /**
   * Text components condensed before assembly.
   * @default ['retrieved_knowledge']
   */
  condenseKeys?: readonly string[];

  /**
   * Share of `maxTokens` each condensed component may occupy.
   * @default 40
   */
  condenseBudgetPercent?: number;

  /**
   * Add the sink's recent entries as an 'operational_context' component.
   * @default false
   */
  includeOperationalContext?: boolean;

  /**
   * Number of sink entries rendered into the operational context.
   * @default 20
   */
  operationalContextEntries?: number;

  /**
   * Callback invoked after each build. Errors it throws are logged, not raised.
   */
  onAssembly?: (event: AssemblyEvent, prompt: AssembledPrompt) => void;
}

export interface ResolvedPipelineConfig {
  maxTokens: number;
  historyMaxTokens: number;
  protectedRoles: readonly MessageRole[];
  priorityOrder: readonly string[];
  condenseKeys: readonly string[];
  condenseBudgetPercent: number;
  includeOperationalContext: boolean;
  operationalContextEntries: number;
  onAssembly?: (event: AssemblyEvent, prompt: AssembledPrompt) => void;
}

export const DEFAULT_PIPELINE_CONFIG = {
  condenseKeys: [COMPONENT_KEYS.retrievedKnowledge],
  condenseBudgetPercent: 40,
  includeOperationalContext: false,
  operationalContextEntries: 20,
} as const;

/**
 * Resolves partial configuration with defaults.
 *
 * @throws PromptfitConfigError for invalid budgets or percentages
 */
export function resolvePipelineConfig(config: PipelineConfig): ResolvedPipelineConfig {
  assertTokenCount(config.maxTokens, "maxTokens");
  const historyMaxTokens = config.historyMaxTokens ?? config.maxTokens;
  assertTokenCount(historyMaxTokens, "historyMaxTokens");

  const condenseBudgetPercent =
    config.condenseBudgetPercent ?? DEFAULT_PIPELINE_CONFIG.condenseBudgetPercent;
  if (!(condenseBudgetPercent > 0 && condenseBudgetPercent <= 100)) {
    throw new PromptfitConfigError(
      `must be in (0, 100], got ${condenseBudgetPercent}`,
      "condenseBudgetPercent",
    );
  }

  const includeOperationalContext =
    config.includeOperationalContext ?? DEFAULT_PIPELINE_CONFIG.includeOperationalContext;
  const priorityOrder =
    config.priorityOrder ??
    (includeOperationalContext
      ? [...DEFAULT_PRIORITY_ORDER, COMPONENT_KEYS.operationalContext]
      : DEFAULT_PRIORITY_ORDER);

  return {
    maxTokens: config.maxTokens,
    historyMaxTokens,
    protectedRoles: config.protectedRoles ?? [],
    priorityOrder,
    condenseKeys: config.condenseKeys ?? DEFAULT_PIPELINE_CONFIG.condenseKeys,
    condenseBudgetPercent,
    includeOperationalContext,
    operationalContextEntries:
      config.operationalContextEntries ?? DEFAULT_PIPELINE_CONFIG.operationalContextEntries,
    onAssembly: config.onAssembly,
  };
}
