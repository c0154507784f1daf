export type MessageRole = "system" | "user" | "assistant";

export const MESSAGE_ROLES: readonly MessageRole[] = ["system", "user", "assistant"];

/**
 * A stored conversation message with its estimated token cost.
 * Created and owned by a ConversationHistoryStore; never mutated.
 */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly cost: number;
}

/**
 * A message as handed to prompt assembly and condensation (cost stripped).
 */
export interface ConversationTurn {
  readonly role: MessageRole;
  readonly content: string;
}

export function isMessageRole(value: unknown): value is MessageRole {
  return typeof value === "string" && (MESSAGE_ROLES as readonly string[]).includes(value);
}

/**
 * Capitalizes the role for display, e.g. "assistant" -> "Assistant".
 */
export function formatRole(role: MessageRole): string {
  return role.charAt(0).toUpperCase() + role.slice(1);
}

/**
 * Renders a turn as "Role: content", the form used inside assembled prompts.
 */
export function renderTurn(turn: ConversationTurn): string {
  return `${formatRole(turn.role)}: ${turn.content}`;
}

/**
 * Flattens turns into "role: content" lines in their original order.
 */
export function flattenTurns(turns: readonly ConversationTurn[]): string {
  return turns.map((turn) => `${turn.role}: ${turn.content}`).join("\n");
}
