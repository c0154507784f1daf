import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import type { CLIEnvironment } from "./environment.js";

/**
 * Options for creating a numeric value parser.
 */
export interface NumericParserOptions {
  label: string;
  integer?: boolean;
  min?: number;
  max?: number;
  /** Reject values equal to `min` */
  exclusiveMin?: boolean;
}

/**
 * Creates a parser function for numeric command-line options with validation.
 *
 * @throws InvalidArgumentError if validation fails
 */
export function createNumericParser({
  label,
  integer = false,
  min,
  max,
  exclusiveMin = false,
}: NumericParserOptions): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (value.trim() === "" || Number.isNaN(parsed)) {
      throw new InvalidArgumentError(`${label} must be a number.`);
    }

    if (integer && !Number.isInteger(parsed)) {
      throw new InvalidArgumentError(`${label} must be an integer.`);
    }

    if (min !== undefined) {
      if (exclusiveMin && parsed <= min) {
        throw new InvalidArgumentError(`${label} must be greater than ${min}.`);
      }
      if (parsed < min) {
        throw new InvalidArgumentError(`${label} must be greater than or equal to ${min}.`);
      }
    }

    if (max !== undefined && parsed > max) {
      throw new InvalidArgumentError(`${label} must be less than or equal to ${max}.`);
    }

    return parsed;
  };
}

/**
 * Parses a comma-separated list of component keys.
 *
 * @throws InvalidArgumentError if the list is empty
 */
export function parseKeyList(value: string): string[] {
  const keys = value
    .split(",")
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
  if (keys.length === 0) {
    throw new InvalidArgumentError("Expected at least one component key.");
  }
  return keys;
}

/**
 * Formats a list for summaries, "-" when empty.
 */
export function formatList(items: readonly string[]): string {
  return items.length > 0 ? items.join(", ") : "-";
}

/**
 * Executes a CLI action with error handling.
 * Catches errors, writes to stderr, and sets exit code 1 on failure.
 *
 * @param action - Async action to execute
 * @param env - CLI environment for error output and exit code
 */
export async function executeAction(
  action: () => Promise<void>,
  env: CLIEnvironment,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    env.stderr.write(`${chalk.red.bold("Error:")} ${message}\n`);
    env.setExitCode(1);
  }
}
