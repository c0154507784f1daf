import type { Command } from "commander";
import { chunkByTokens, estimateTokens } from "promptfit";
import type { ChunkConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { readInput } from "./input.js";
import { createNumericParser, executeAction } from "./utils.js";

export interface CLIChunkOptions {
  maxTokens?: number;
}

/**
 * Splits a file into chunks of at most `maxTokens` estimated tokens, each
 * preceded by a header line.
 */
export async function executeChunk(
  file: string | undefined,
  options: CLIChunkOptions,
  env: CLIEnvironment,
): Promise<void> {
  if (options.maxTokens === undefined) {
    throw new Error("--max-tokens is required (or set [chunk].max-tokens in the config file)");
  }

  const text = await readInput(file, env.stdin);
  const chunks = chunkByTokens(text, options.maxTokens);
  env.createLogger("chunk").debug(`Split ${text.length} chars into ${chunks.length} chunk(s)`);

  chunks.forEach((chunk, index) => {
    env.stdout.write(
      `--- chunk ${index + 1}/${chunks.length} (≈${estimateTokens(chunk)} tokens) ---\n${chunk}\n`,
    );
  });
}

export function registerChunkCommand(
  program: Command,
  env: CLIEnvironment,
  config?: ChunkConfig,
): void {
  program
    .command(COMMANDS.chunk)
    .description("Split text into chunks that fit a token limit.")
    .argument("[file]", "File to split. If omitted, stdin is used.")
    .option(
      OPTION_FLAGS.maxTokens,
      OPTION_DESCRIPTIONS.chunkMaxTokens,
      createNumericParser({ label: "Max tokens", integer: true, min: 1 }),
      config?.["max-tokens"],
    )
    .action((file: string | undefined, options: CLIChunkOptions) =>
      executeAction(() => executeChunk(file, options, env), env),
    );
}
