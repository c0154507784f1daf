// Token estimation
export type { EstimateTokens, Tokenizer, TokenEstimatorOptions } from "./tokens/estimator.js";
export {
  chunkByTokens,
  createTokenEstimator,
  estimateTokens,
  guardEstimator,
} from "./tokens/estimator.js";

// Messages and conversation history
export type { ConversationTurn, Message, MessageRole } from "./core/messages.js";
export { flattenTurns, formatRole, isMessageRole, MESSAGE_ROLES, renderTurn } from "./core/messages.js";
export type {
  AddMessageResult,
  HistoryStoreOptions,
  MessageRejectedEvent,
} from "./history/history-store.js";
export { ConversationHistoryStore } from "./history/history-store.js";

// Condensation
export type {
  CondensationConfig,
  CondensationStrategy,
  ResolvedCondensationConfig,
} from "./condensation/config.js";
export {
  CONDENSATION_STRATEGIES,
  DEFAULT_CONDENSATION_CONFIG,
  resolveCondensationConfig,
} from "./condensation/config.js";
export type {
  CondensationEngineOptions,
  CondensationMethod,
  CondensationRequest,
  CondensationResult,
  CondensationSource,
} from "./condensation/engine.js";
export { CondensationEngine } from "./condensation/engine.js";
export type { ModelSummarizerOptions, Summarizer } from "./condensation/summarizer.js";
export {
  buildSummarizationPrompt,
  createModelSummarizer,
  DEFAULT_SUMMARIZATION_PROMPT,
} from "./condensation/summarizer.js";

// Prompt assembly
export type {
  HistoryComponent,
  PromptComponent,
  PromptComponents,
  TextComponent,
} from "./assembly/components.js";
export { historyComponent, isEmptyComponent, textComponent } from "./assembly/components.js";
export type { AssemblerConfig, ResolvedAssemblerConfig } from "./assembly/config.js";
export { resolveAssemblerConfig } from "./assembly/config.js";
export type { AssembledPrompt, PromptAssemblerOptions } from "./assembly/assembler.js";
export { assemblePrompt, PromptAssembler } from "./assembly/assembler.js";

// Pipeline
export type {
  AssemblyEvent,
  AssemblyStats,
  PipelineConfig,
  ResolvedPipelineConfig,
} from "./pipeline/config.js";
export { DEFAULT_PIPELINE_CONFIG, resolvePipelineConfig } from "./pipeline/config.js";
export type { PromptInput, PromptPipelineOptions } from "./pipeline/prompt-pipeline.js";
export { PromptPipeline } from "./pipeline/prompt-pipeline.js";

// Logging and observability
export type { LoggerOptions } from "./logging/logger.js";
export { createLogger, defaultLogger, LOG_LEVEL_IDS, parseLogLevel } from "./logging/logger.js";
export type { SinkEntry } from "./logging/observability-sink.js";
export { attachSink, ObservabilitySink } from "./logging/observability-sink.js";

// Errors, constants and utilities
export {
  PromptfitConfigError,
  PromptfitError,
  toError,
} from "./core/errors.js";
export {
  CHARS_PER_TOKEN,
  COMPONENT_KEYS,
  DEFAULT_COMPONENT_PREFIXES,
  DEFAULT_CRITICAL_KEYS,
  DEFAULT_PRIORITY_ORDER,
} from "./core/constants.js";
export { TimeoutError, withTimeout } from "./utils/timing.js";
