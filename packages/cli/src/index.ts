export type {
  AssembleConfig,
  ChunkConfig,
  CLIConfig,
  CondenseConfig,
  EstimateConfig,
  GlobalConfig,
} from "./config.js";
export { ConfigError, getConfigPath, loadConfig, validateConfig } from "./config.js";
export type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
export { createDefaultEnvironment, createLoggerFactory } from "./environment.js";
export type { PromptDocument } from "./input.js";
export { InputError, parsePromptDocument, promptDocumentSchema } from "./input.js";
export type { RunCLIOptions } from "./program.js";
export { createProgram, runCLI } from "./program.js";
