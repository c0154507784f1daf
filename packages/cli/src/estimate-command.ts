import type { Command } from "commander";
import { createTokenEstimator } from "promptfit";
import type { EstimateConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { readInput } from "./input.js";
import { createNumericParser, executeAction } from "./utils.js";

export interface CLIEstimateOptions {
  charsPerToken?: number;
}

/**
 * Prints the token estimate of a file or of stdin.
 */
export async function executeEstimate(
  file: string | undefined,
  options: CLIEstimateOptions,
  env: CLIEnvironment,
): Promise<void> {
  const text = await readInput(file, env.stdin);
  const estimate = createTokenEstimator({
    charsPerToken: options.charsPerToken,
    logger: env.createLogger("estimate"),
  });

  env.stdout.write(`${estimate(text)}\n`);
}

export function registerEstimateCommand(
  program: Command,
  env: CLIEnvironment,
  config?: EstimateConfig,
): void {
  program
    .command(COMMANDS.estimate)
    .description("Estimate the token count of a file or of stdin.")
    .argument("[file]", "File to estimate. If omitted, stdin is used.")
    .option(
      OPTION_FLAGS.charsPerToken,
      OPTION_DESCRIPTIONS.charsPerToken,
      createNumericParser({ label: "Chars per token", min: 0, exclusiveMin: true }),
      config?.["chars-per-token"],
    )
    .action((file: string | undefined, options: CLIEstimateOptions) =>
      executeAction(() => executeEstimate(file, options, env), env),
    );
}
