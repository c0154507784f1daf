import chalk from "chalk";
import type { Command } from "commander";
import { CondensationEngine } from "promptfit";
import type { CondenseConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS, SUMMARY_PREFIX } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { readInput } from "./input.js";
import { createNumericParser, executeAction } from "./utils.js";

export interface CLICondenseOptions {
  targetTokens?: number;
  hint?: string;
  quiet?: boolean;
  truncateCharsPerToken?: number;
  hardCharsPerToken?: number;
}

/**
 * Condenses a file to a target size by deterministic truncation. There is
 * no model client in the CLI, so the summarizer is never involved.
 */
export async function executeCondense(
  file: string | undefined,
  options: CLICondenseOptions,
  env: CLIEnvironment,
): Promise<void> {
  if (options.targetTokens === undefined) {
    throw new Error(
      "--target-tokens is required (or set [condense].target-tokens in the config file)",
    );
  }

  const text = await readInput(file, env.stdin);
  const engine = new CondensationEngine({
    defaultStrategy: "truncate",
    truncateCharsPerToken: options.truncateCharsPerToken,
    hardCharsPerToken: options.hardCharsPerToken,
    logger: env.createLogger("condense"),
  });

  const result = await engine.condenseDetailed({
    source: text,
    targetTokens: options.targetTokens,
    relevanceHint: options.hint,
  });

  env.stdout.write(`${result.text}\n`);

  if (!options.quiet) {
    env.stderr.write(
      `${chalk.dim(SUMMARY_PREFIX)} ${chalk.cyan(result.method)}: ${result.tokensBefore} → ${result.tokensAfter} tokens (target ${options.targetTokens})\n`,
    );
  }
}

export function registerCondenseCommand(
  program: Command,
  env: CLIEnvironment,
  config?: CondenseConfig,
): void {
  program
    .command(COMMANDS.condense)
    .description("Shrink text to a target token count by truncation.")
    .argument("[file]", "File to condense. If omitted, stdin is used.")
    .option(
      OPTION_FLAGS.targetTokens,
      OPTION_DESCRIPTIONS.targetTokens,
      createNumericParser({ label: "Target tokens", integer: true, min: 1 }),
      config?.["target-tokens"],
    )
    .option(OPTION_FLAGS.hint, OPTION_DESCRIPTIONS.hint)
    .option(OPTION_FLAGS.quiet, OPTION_DESCRIPTIONS.quiet, config?.quiet)
    .action((file: string | undefined, options: CLICondenseOptions) =>
      executeAction(
        () =>
          executeCondense(
            file,
            {
              ...options,
              truncateCharsPerToken: config?.["truncate-chars-per-token"],
              hardCharsPerToken: config?.["hard-chars-per-token"],
            },
            env,
          ),
        env,
      ),
    );
}
