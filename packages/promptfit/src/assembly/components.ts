/**
 * Prompt components: the named blocks handed to the assembler.
 *
 * A component is either plain text or a conversation history. The assembler
 * dispatches on `kind`; history is packed newest-first, text as a whole.
 */

import type { ConversationTurn } from "../core/messages.js";

export interface TextComponent {
  readonly kind: "text";
  readonly text: string;
}

export interface HistoryComponent {
  readonly kind: "history";
  readonly turns: readonly ConversationTurn[];
}

export type PromptComponent = TextComponent | HistoryComponent;

/**
 * Components keyed by name. Priority comes from the order passed to the
 * assembler, not from the object's key order.
 */
export type PromptComponents = Readonly<Record<string, PromptComponent | undefined>>;

export function textComponent(text: string): TextComponent {
  return { kind: "text", text };
}

/**
 * Copies the turns so later changes to the caller's array do not leak in.
 */
export function historyComponent(turns: readonly ConversationTurn[]): HistoryComponent {
  return { kind: "history", turns: turns.map(({ role, content }) => ({ role, content })) };
}

export function isEmptyComponent(component: PromptComponent): boolean {
  switch (component.kind) {
    case "text":
      return component.text.length === 0;
    case "history":
      return component.turns.length === 0;
  }
}
