/**
 * Input handling: reading text from files or stdin, and parsing prompt documents.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { load as parseToml } from "js-toml";
import { historyComponent, type PromptComponent, textComponent } from "promptfit";
import { z } from "zod";
import type { TTYAwareStream } from "./environment.js";

/**
 * Raised for unreadable or invalid input files.
 */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(source ? `${source}: ${message}` : message);
    this.name = "InputError";
  }
}

const turnSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

/**
 * A prompt document as accepted by `promptfit assemble`.
 *
 * @example
 * ```json
 * {
 *   "maxTokens": 500,
 *   "priority": ["user_query", "system_message", "history"],
 *   "components": {
 *     "system_message": "You are a support agent.",
 *     "user_query": "Can I still cancel?",
 *     "history": [{ "role": "user", "content": "Where is my order?" }]
 *   }
 * }
 * ```
 */
export const promptDocumentSchema = z
  .object({
    maxTokens: z.number().int().nonnegative().optional(),
    priority: z.array(z.string()).optional(),
    components: z.record(z.string(), z.union([z.string(), z.array(turnSchema)])),
  })
  .strict();

export type PromptDocument = z.infer<typeof promptDocumentSchema>;

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    if (typeof chunk === "string") {
      chunks.push(chunk);
    } else {
      chunks.push(chunk.toString("utf8"));
    }
  }
  return chunks.join("");
}

/**
 * Reads `file`, or stdin when no file is given and stdin is piped.
 *
 * @throws InputError when neither is available or the file cannot be read
 */
export async function readInput(
  file: string | undefined,
  stdin: TTYAwareStream,
): Promise<string> {
  if (file && file !== "-") {
    try {
      return await readFile(file, "utf-8");
    } catch (error) {
      throw new InputError(
        `Failed to read file: ${error instanceof Error ? error.message : "Unknown error"}`,
        file,
      );
    }
  }

  if (stdin.isTTY) {
    throw new InputError("Input is required. Provide a file or pipe content via stdin.");
  }

  return readStream(stdin);
}

/**
 * Parses a prompt document. TOML when `source` ends in .toml, JSON otherwise.
 *
 * @throws InputError for syntax errors or documents that do not match the schema
 */
export function parsePromptDocument(content: string, source = "stdin"): PromptDocument {
  const isToml = extname(source).toLowerCase() === ".toml";

  let raw: unknown;
  try {
    raw = isToml ? parseToml(content) : JSON.parse(content);
  } catch (error) {
    throw new InputError(
      `Invalid ${isToml ? "TOML" : "JSON"}: ${error instanceof Error ? error.message : "Unknown error"}`,
      source,
    );
  }

  const parsed = promptDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw new InputError(`Invalid prompt document: ${details}`, source);
  }

  return parsed.data;
}

/**
 * Converts document components into assembler components: strings become
 * text, turn arrays become history.
 */
export function toPromptComponents(document: PromptDocument): Record<string, PromptComponent> {
  const components: Record<string, PromptComponent> = {};
  for (const [key, value] of Object.entries(document.components)) {
    components[key] = typeof value === "string" ? textComponent(value) : historyComponent(value);
  }
  return components;
}
