/**
 * Conversation fixture generators for testing.
 * Provides utilities for creating test conversation data.
 */

import type { ConversationHistoryStore, ConversationTurn } from "promptfit";

/**
 * Create a conversation with a specified number of turns.
 * Each turn consists of a user message and an assistant response.
 *
 * @param turnCount - Number of conversation turns to generate
 * @param options - Configuration options
 * @returns Alternating user and assistant turns
 *
 * @example
 * ```typescript
 * const turns = createConversation(5);
 * // Creates 10 turns: 5 user + 5 assistant
 * ```
 */
export function createConversation(
  turnCount: number,
  options?: {
    /** Prefix for user messages (default: "User message") */
    userPrefix?: string;
    /** Prefix for assistant messages (default: "Assistant response") */
    assistantPrefix?: string;
    /** Characters of filler appended to each message (default: 0) */
    padding?: number;
  },
): ConversationTurn[] {
  const turns: ConversationTurn[] = [];
  const userPrefix = options?.userPrefix ?? "User message";
  const assistantPrefix = options?.assistantPrefix ?? "Assistant response";
  const filler = "x".repeat(Math.max(0, options?.padding ?? 0));

  for (let i = 0; i < turnCount; i++) {
    turns.push({
      role: "user",
      content: `${userPrefix} ${i + 1}: This is turn ${i + 1}.${filler}`,
    });

    turns.push({
      role: "assistant",
      content: `${assistantPrefix} ${i + 1}: I acknowledge turn ${i + 1}.${filler}`,
    });
  }

  return turns;
}

/**
 * Create a minimal conversation for quick tests.
 * Returns a single turn: one user message and one assistant response.
 */
export function createMinimalConversation(): ConversationTurn[] {
  return [
    { role: "user", content: "Hello" },
    { role: "assistant", content: "Hi there!" },
  ];
}

/**
 * Create a text of `tokens` estimated tokens (4 characters each) made of
 * short words, for condensation and chunking tests.
 */
export function createText(tokens: number, word = "lorem"): string {
  const length = Math.max(0, tokens * 4);
  let text = "";
  while (text.length < length) {
    text += text.length === 0 ? word : ` ${word}`;
  }
  return text.slice(0, length);
}

/**
 * Record every turn into a history store.
 *
 * @returns The number of turns the store accepted
 */
export function fillHistory(store: ConversationHistoryStore, turns: readonly ConversationTurn[]): number {
  let accepted = 0;
  for (const turn of turns) {
    if (store.addMessage(turn.role, turn.content).accepted) {
      accepted++;
    }
  }
  return accepted;
}
