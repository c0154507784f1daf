import { Command, InvalidArgumentError } from "commander";

import packageJson from "../package.json" with { type: "json" };

import { registerAssembleCommand } from "./assemble-command.js";
import { registerChunkCommand } from "./chunk-command.js";
import { registerCondenseCommand } from "./condense-command.js";
import { type CLIConfig, loadConfig } from "./config.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  type CLILogLevel,
  LOG_LEVELS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";
import { registerEstimateCommand } from "./estimate-command.js";

/**
 * Parses and validates the log level option value.
 */
function parseLogLevel(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  logLevel?: CLILogLevel;
}

/**
 * Creates and configures the CLI program.
 *
 * @param env - CLI environment configuration for I/O and dependencies
 * @param config - Optional CLI configuration loaded from config file
 * @returns Configured Commander program ready for parsing
 */
export function createProgram(env: CLIEnvironment, config?: CLIConfig): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(packageJson.version)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevel)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerEstimateCommand(program, env, config?.estimate);
  registerChunkCommand(program, env, config?.chunk);
  registerCondenseCommand(program, env, config?.condense);
  registerAssembleCommand(program, env, config?.assemble);

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override - if provided, skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  // Config errors fail fast, before any command runs
  const config = opts.config !== undefined ? opts.config : loadConfig();
  const envOverrides = opts.env ?? {};
  const argv = envOverrides.argv ?? process.argv;

  // First pass: parse global options only (skip if help requested)
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevel)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false);

  preParser.parse(argv);
  const globalOpts = preParser.opts<GlobalOptions>();

  // Priority: CLI flags > config file > defaults
  const loggerConfig: CLILoggerConfig = {
    logLevel: globalOpts.logLevel ?? config.global?.["log-level"],
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };
  const program = createProgram(env, config);
  await program.parseAsync(env.argv);
}
