/** CLI program name */
export const CLI_NAME = "promptfit";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION =
  "Estimate, chunk, condense and assemble prompt text under a token budget.";

/** Available CLI commands */
export const COMMANDS = {
  estimate: "estimate",
  chunk: "chunk",
  condense: "condense",
  assemble: "assemble",
} as const;

/** Valid log level names */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type CLILogLevel = (typeof LOG_LEVELS)[number];

/** Default budget for the assemble command when neither flag, document nor config sets one */
export const DEFAULT_ASSEMBLE_MAX_TOKENS = 4000;

/** Command-line option flags */
export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  charsPerToken: "--chars-per-token <n>",
  maxTokens: "--max-tokens <n>",
  targetTokens: "--target-tokens <n>",
  hint: "--hint <text>",
  priority: "--priority <keys>",
  quiet: "-q, --quiet",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  charsPerToken: "Characters per token for the estimate.",
  chunkMaxTokens: "Maximum estimated tokens per chunk.",
  assembleMaxTokens: "Token budget for the assembled prompt.",
  targetTokens: "Target size of the condensed text in tokens.",
  hint: "Topic the condensed text should stay relevant to.",
  priority: "Comma-separated component keys, highest priority first.",
  quiet: "Suppress the summary on stderr.",
} as const;

/** Prefix for summary output written to stderr */
export const SUMMARY_PREFIX = "[promptfit]";
