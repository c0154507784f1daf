/**
 * Configuration for the prompt assembler.
 */

import {
  DEFAULT_COMPONENT_PREFIXES,
  DEFAULT_COMPONENT_SEPARATOR,
  DEFAULT_CRITICAL_CHARS_PER_TOKEN,
  DEFAULT_CRITICAL_KEYS,
  DEFAULT_HARD_CHARS_PER_TOKEN,
  DEFAULT_PRIORITY_ORDER,
} from "../core/constants.js";
import { assertPositiveRatio } from "../core/errors.js";

export interface AssemblerConfig {
  /**
   * Component keys, highest priority first. Used when `assemble` gets none.
   * @default ['user_query', 'system_message', 'task_instructions', 'history', 'retrieved_knowledge']
   */
  priorityOrder?: readonly string[];

  /**
   * Keys that are cut rather than omitted when they come first and do not fit.
   * @default ['user_query', 'system_message']
   */
  criticalKeys?: readonly string[];

  /**
   * Text placed before a component's content, by key. Merged over the defaults
   * ('User: ', 'Instructions: ', 'Context: ', 'Recent activity: ').
   */
  prefixes?: Readonly<Record<string, string>>;

  /**
   * Separator counted after each component; components are joined with two of them.
   * @default '\n'
   */
  separator?: string;

  /**
   * Characters kept per remaining token when a critical component is cut.
   * @default 3
   */
  criticalCharsPerToken?: number;

  /**
   * Characters kept per budget token by the final hard truncation.
   * @default 3
   */
  hardCharsPerToken?: number;
}

export interface ResolvedAssemblerConfig {
  priorityOrder: readonly string[];
  criticalKeys: ReadonlySet<string>;
  prefixes: Readonly<Record<string, string>>;
  separator: string;
  criticalCharsPerToken: number;
  hardCharsPerToken: number;
}

export function resolveAssemblerConfig(config: AssemblerConfig = {}): ResolvedAssemblerConfig {
  const resolved: ResolvedAssemblerConfig = {
    priorityOrder: [...(config.priorityOrder ?? DEFAULT_PRIORITY_ORDER)],
    criticalKeys: new Set(config.criticalKeys ?? DEFAULT_CRITICAL_KEYS),
    prefixes: { ...DEFAULT_COMPONENT_PREFIXES, ...config.prefixes },
    separator: config.separator ?? DEFAULT_COMPONENT_SEPARATOR,
    criticalCharsPerToken: config.criticalCharsPerToken ?? DEFAULT_CRITICAL_CHARS_PER_TOKEN,
    hardCharsPerToken: config.hardCharsPerToken ?? DEFAULT_HARD_CHARS_PER_TOKEN,
  };

  assertPositiveRatio(resolved.criticalCharsPerToken, "criticalCharsPerToken");
  assertPositiveRatio(resolved.hardCharsPerToken, "hardCharsPerToken");

  return resolved;
}
