import chalk from "chalk";
import type { Command } from "commander";
import { PromptAssembler } from "promptfit";
import type { AssembleConfig } from "./config.js";
import {
  COMMANDS,
  DEFAULT_ASSEMBLE_MAX_TOKENS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
  SUMMARY_PREFIX,
} from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { parsePromptDocument, readInput, toPromptComponents } from "./input.js";
import { createNumericParser, executeAction, formatList, parseKeyList } from "./utils.js";

export interface CLIAssembleOptions {
  maxTokens?: number;
  priority?: string[];
  quiet?: boolean;
}

/**
 * Assembles a prompt document and prints the prompt to stdout, with a
 * summary of what was included on stderr.
 *
 * Budget and priority come from the flags, then the document, then the
 * config file.
 */
export async function executeAssemble(
  file: string | undefined,
  options: CLIAssembleOptions,
  env: CLIEnvironment,
  config?: AssembleConfig,
): Promise<void> {
  const content = await readInput(file, env.stdin);
  const document = parsePromptDocument(content, file && file !== "-" ? file : "stdin");

  const maxTokens =
    options.maxTokens ?? document.maxTokens ?? config?.["max-tokens"] ?? DEFAULT_ASSEMBLE_MAX_TOKENS;
  const priority = options.priority ?? document.priority ?? config?.priority;

  const assembler = new PromptAssembler({
    criticalKeys: config?.critical,
    logger: env.createLogger("assemble"),
  });
  const prompt = assembler.assembleDetailed(toPromptComponents(document), maxTokens, priority);

  env.stdout.write(`${prompt.text}\n`);

  if (!options.quiet) {
    const lines = [
      `${chalk.dim(SUMMARY_PREFIX)} ${chalk.bold(`${prompt.estimatedCost}/${maxTokens}`)} tokens${prompt.hardTruncated ? chalk.yellow(" (hard-truncated)") : ""}`,
      `  included:  ${formatList(prompt.included)}`,
      `  truncated: ${formatList(prompt.truncated)}`,
      `  omitted:   ${formatList(prompt.omitted)}`,
    ];
    env.stderr.write(`${lines.join("\n")}\n`);
  }
}

export function registerAssembleCommand(
  program: Command,
  env: CLIEnvironment,
  config?: AssembleConfig,
): void {
  program
    .command(COMMANDS.assemble)
    .description("Assemble a prompt document (JSON or TOML) under a token budget.")
    .argument("[file]", "Prompt document. If omitted, JSON is read from stdin.")
    .option(
      OPTION_FLAGS.maxTokens,
      OPTION_DESCRIPTIONS.assembleMaxTokens,
      createNumericParser({ label: "Max tokens", integer: true, min: 0 }),
    )
    .option(OPTION_FLAGS.priority, OPTION_DESCRIPTIONS.priority, parseKeyList)
    .option(OPTION_FLAGS.quiet, OPTION_DESCRIPTIONS.quiet, config?.quiet)
    .action((file: string | undefined, options: CLIAssembleOptions) =>
      executeAction(() => executeAssemble(file, options, env, config), env),
    );
}
