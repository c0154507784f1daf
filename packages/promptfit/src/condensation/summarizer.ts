/**
 * Summarizer contract and a model-backed implementation.
 *
 * The condensation engine only knows the {@link Summarizer} signature. How a
 * summary is produced (a remote model, a local heuristic) is up to the caller.
 */

import { withTimeout } from "../utils/timing.js";

/**
 * Shrinks `text` to roughly `targetTokens`, favouring content related to
 * `relevanceHint`. May be slow and may fail; the engine tolerates both.
 */
export type Summarizer = (
  text: string,
  targetTokens: number,
  relevanceHint?: string,
) => string | Promise<string>;

/**
 * Default instructions placed before the text to summarize.
 */
export const DEFAULT_SUMMARIZATION_PROMPT = `Summarize the following content concisely, preserving:
1. Key decisions made and their rationale
2. Important facts and data
3. Errors encountered and how they were resolved
4. Current task context and goals

Write a brief narrative paragraph, not bullet points.`;

export interface ModelSummarizerOptions {
  /** Sends a prompt to a language model and resolves to its reply */
  complete: (prompt: string) => Promise<string>;
  /** Replaces {@link DEFAULT_SUMMARIZATION_PROMPT} */
  prompt?: string;
  /** Rejects the summary when the model takes longer than this */
  timeoutMs?: number;
  /** Characters per token used to express the target length */
  charsPerToken?: number;
}

/**
 * Builds the full summarization prompt for one request.
 */
export function buildSummarizationPrompt(
  text: string,
  targetTokens: number,
  relevanceHint?: string,
  instructions: string = DEFAULT_SUMMARIZATION_PROMPT,
  charsPerToken = 4,
): string {
  const lines = [
    instructions,
    `Keep the summary under ${targetTokens} tokens (about ${Math.floor(targetTokens * charsPerToken)} characters).`,
  ];
  if (relevanceHint) {
    lines.push(`Focus on what is relevant to: ${relevanceHint}`);
  }
  lines.push("", "Content:", text);
  return lines.join("\n");
}

/**
 * Adapts a model completion call into a {@link Summarizer}.
 *
 * @example
 * ```typescript
 * const summarizer = createModelSummarizer({
 *   complete: (prompt) => client.complete(prompt, { temperature: 0.3 }),
 *   timeoutMs: 15_000,
 * });
 * const engine = new CondensationEngine({ summarizer });
 * ```
 */
export function createModelSummarizer(options: ModelSummarizerOptions): Summarizer {
  return async (text, targetTokens, relevanceHint) => {
    const prompt = buildSummarizationPrompt(
      text,
      targetTokens,
      relevanceHint,
      options.prompt,
      options.charsPerToken,
    );
    const request = () => options.complete(prompt);
    const response =
      options.timeoutMs === undefined
        ? await request()
        : await withTimeout(request, options.timeoutMs);
    return response.trim();
  };
}
