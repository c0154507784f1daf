/**
 * ConversationHistoryStore keeps role-tagged messages under a token ceiling.
 *
 * Messages are evicted oldest first when a new one would push the running
 * total over `maxTokens`. A message that cannot fit even after eviction is
 * rejected: the caller sees it in the returned result and the log, never as
 * an exception.
 */

import type { ILogObj, Logger } from "tslog";
import { assertTokenCount, toError } from "../core/errors.js";
import type { ConversationTurn, Message, MessageRole } from "../core/messages.js";
import { defaultLogger } from "../logging/logger.js";
import { type EstimateTokens, guardEstimator } from "../tokens/estimator.js";

/**
 * Outcome of {@link ConversationHistoryStore.addMessage}.
 */
export type AddMessageResult =
  | {
      accepted: true;
      message: Message;
      /** Messages evicted to make room, oldest first */
      evicted: Message[];
    }
  | {
      accepted: false;
      reason: "exceeds-budget";
      role: MessageRole;
      cost: number;
      evicted: Message[];
    };

/**
 * Passed to `onReject` when a message cannot be stored.
 */
export interface MessageRejectedEvent {
  role: MessageRole;
  cost: number;
  currentTokens: number;
  maxTokens: number;
}

export interface HistoryStoreOptions {
  /** Token ceiling for the stored messages */
  maxTokens: number;
  /** Cost function, guarded like a tokenizer; defaults to `ceil(length / 4)` */
  estimate?: EstimateTokens;
  /**
   * Roles exempt from eviction. Empty means strict FIFO eviction.
   * @default []
   */
  protectedRoles?: readonly MessageRole[];
  logger?: Logger<ILogObj>;
  /** Called whenever a message is rejected */
  onReject?: (event: MessageRejectedEvent) => void;
}

/**
 * @example
 * ```typescript
 * const history = new ConversationHistoryStore({ maxTokens: 10 });
 * history.addMessage("user", "Hello");          // 2 tokens
 * history.addMessage("assistant", "World");     // 2 tokens
 * history.addMessage("user", "This is a test"); // 4 tokens
 * history.addMessage("assistant", "Another one"); // evicts "Hello"
 * history.currentTokenCount(); // 9
 * ```
 */
export class ConversationHistoryStore {
  private readonly messageList: Message[] = [];
  private totalCost = 0;
  private readonly estimate: EstimateTokens;
  private readonly protectedRoles: ReadonlySet<MessageRole>;
  private readonly logger: Logger<ILogObj>;
  private readonly onReject?: (event: MessageRejectedEvent) => void;

  readonly maxTokens: number;

  constructor(options: HistoryStoreOptions) {
    assertTokenCount(options.maxTokens, "maxTokens");
    this.maxTokens = options.maxTokens;
    this.logger = options.logger ?? defaultLogger;
    this.estimate = guardEstimator(options.estimate, this.logger);
    this.protectedRoles = new Set(options.protectedRoles ?? []);
    this.onReject = options.onReject;
  }

  /**
   * Evicts as needed, then appends the message if it fits.
   */
  addMessage(role: MessageRole, content: string): AddMessageResult {
    const cost = this.estimate(content);
    this.logger.debug(`Adding ${role} message: ${content.length} chars, ~${cost} tokens`);

    const evicted = this.evictUntilFits(cost);

    if (this.totalCost + cost > this.maxTokens) {
      this.logger.warn(
        `Rejected ${role} message (${cost} tokens): ${this.totalCost} tokens stored after eviction, limit ${this.maxTokens}`,
      );
      this.notifyReject({
        role,
        cost,
        currentTokens: this.totalCost,
        maxTokens: this.maxTokens,
      });
      return { accepted: false, reason: "exceeds-budget", role, cost, evicted };
    }

    const message: Message = Object.freeze({ role, content, cost });
    this.messageList.push(message);
    this.totalCost += cost;
    this.logger.debug(`Stored ${role} message; total ${this.totalCost}/${this.maxTokens} tokens`);

    return { accepted: true, message, evicted };
  }

  /**
   * Removes the oldest evictable messages until `additional` more tokens fit
   * or nothing evictable is left.
   *
   * @returns The evicted messages, in eviction order
   */
  evictUntilFits(additional = 0): Message[] {
    const evicted: Message[] = [];

    while (this.totalCost + additional > this.maxTokens) {
      const index = this.messageList.findIndex((message) => !this.protectedRoles.has(message.role));
      if (index === -1) {
        break;
      }

      const [removed] = this.messageList.splice(index, 1);
      this.totalCost -= removed.cost;
      evicted.push(removed);
      this.logger.info(
        `Evicted oldest ${removed.role} message (${removed.cost} tokens); total ${this.totalCost}/${this.maxTokens}`,
      );
    }

    return evicted;
  }

  /**
   * Stored messages as role/content pairs, oldest first. Safe to hand to an
   * assembler: later mutations of the store do not affect the array.
   */
  snapshot(): ConversationTurn[] {
    return this.messageList.map(({ role, content }) => ({ role, content }));
  }

  /**
   * Stored messages including their costs, oldest first.
   */
  messages(): Message[] {
    return [...this.messageList];
  }

  currentTokenCount(): number {
    return this.totalCost;
  }

  get size(): number {
    return this.messageList.length;
  }

  clear(): void {
    this.messageList.length = 0;
    this.totalCost = 0;
    this.logger.info("Conversation history cleared");
  }

  private notifyReject(event: MessageRejectedEvent): void {
    if (!this.onReject) return;
    try {
      this.onReject(event);
    } catch (error) {
      this.logger.warn(`onReject callback error: ${toError(error).message}`);
    }
  }
}
