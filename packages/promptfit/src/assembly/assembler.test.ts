import { createFailingTokenizer, createTestLogger, createWordTokenizer } from "@promptfit/testing";
import { describe, expect, it } from "vitest";
import { createLogger } from "../logging/logger.js";
import { assemblePrompt, PromptAssembler, type PromptAssemblerOptions } from "./assembler.js";
import { historyComponent, textComponent } from "./components.js";

const silentLogger = createLogger({ type: "hidden" });
const words = createWordTokenizer();

function createAssembler(options: PromptAssemblerOptions = {}) {
  return new PromptAssembler({ logger: silentLogger, ...options });
}

const conversation = historyComponent([
  { role: "user", content: "first question" },
  { role: "assistant", content: "first answer" },
  { role: "user", content: "second question" },
  { role: "assistant", content: "second answer" },
]);

describe("PromptAssembler", () => {
  it("cuts a critical first component that does not fit", () => {
    const components = { system_message: textComponent("S"), user_query: textComponent("Q") };

    expect(assemblePrompt(components, 1, ["user_query", "system_message"], { logger: silentLogger })).toBe(
      "Use",
    );
    expect(
      createAssembler().assembleDetailed(components, 1, ["user_query", "system_message"]),
    ).toEqual({
      text: "Use",
      estimatedCost: 1,
      included: ["user_query"],
      truncated: ["user_query"],
      omitted: ["system_message"],
      skipped: [],
      droppedHistoryTurns: 0,
      hardTruncated: false,
    });
  });

  it("joins components in priority order with their prefixes", () => {
    const result = createAssembler().assembleDetailed(
      { system_message: textComponent("You are helpful."), user_query: textComponent("Hi") },
      100,
    );

    expect(result.text).toBe("User: Hi\n\nYou are helpful.");
    expect(result.included).toEqual(["user_query", "system_message"]);
    expect(result.skipped).toEqual(["task_instructions", "history", "retrieved_knowledge"]);
    expect(result.estimatedCost).toBe(7);
  });

  it("stops at the first component that does not fit", () => {
    const result = createAssembler().assembleDetailed(
      {
        user_query: textComponent("Hi"),
        system_message: textComponent("You are helpful."),
        task_instructions: textComponent("Be brief, please."),
        note: textComponent("ok"),
      },
      10,
      ["user_query", "system_message", "task_instructions", "note"],
    );

    expect(result.text).toBe("User: Hi\n\nYou are helpful.");
    expect(result.included).toEqual(["user_query", "system_message"]);
    expect(result.omitted).toEqual(["task_instructions", "note"]);
  });

  it("omits a critical component that is not first", () => {
    const result = createAssembler().assembleDetailed(
      { user_query: textComponent("Q"), system_message: textComponent("x".repeat(100)) },
      3,
    );

    expect(result.text).toBe("User: Q");
    expect(result.truncated).toEqual([]);
    expect(result.omitted).toEqual(["system_message"]);
  });

  it("logs omitted components as warnings", () => {
    const { logger, messages } = createTestLogger(4);
    const assembler = createAssembler({ logger });

    assembler.assemble(
      { user_query: textComponent("Q"), task_instructions: textComponent("x".repeat(100)) },
      3,
    );

    expect(messages()).toEqual([
      "Component 'task_instructions' does not fit (29 tokens needed, 1 remaining); omitting it and lower-priority components",
    ]);
  });

  describe("history", () => {
    it("keeps the most recent turns that fit, in chronological order", () => {
      const result = createAssembler().assembleDetailed(
        { user_query: textComponent("Q"), history: conversation },
        15,
        ["user_query", "history"],
      );

      expect(result.text).toBe("User: Q\n\nUser: second question\nAssistant: second answer");
      expect(result.included).toEqual(["user_query", "history"]);
      expect(result.droppedHistoryTurns).toBe(2);
      expect(result.estimatedCost).toBe(14);
    });

    it("treats history as not fitting when no turn fits", () => {
      const result = createAssembler().assembleDetailed(
        { user_query: textComponent("Q"), history: conversation, note: textComponent("k") },
        3,
        ["user_query", "history", "note"],
      );

      expect(result.text).toBe("User: Q");
      expect(result.omitted).toEqual(["history", "note"]);
    });

    it("applies a configured history prefix", () => {
      const result = createAssembler({ prefixes: { history: "Conversation:\n" } }).assembleDetailed(
        { history: historyComponent([{ role: "user", content: "Hello" }]) },
        100,
        ["history"],
      );

      expect(result.text).toBe("Conversation:\nUser: Hello");
    });
  });

  describe("edge cases", () => {
    it("records absent and empty components as skipped", () => {
      const result = createAssembler().assembleDetailed(
        { user_query: textComponent("Q"), system_message: textComponent(""), history: historyComponent([]) },
        100,
      );

      expect(result.included).toEqual(["user_query"]);
      expect(result.skipped).toEqual([
        "system_message",
        "task_instructions",
        "history",
        "retrieved_knowledge",
      ]);
    });

    it("includes nothing for a zero budget", () => {
      const result = createAssembler().assembleDetailed({ user_query: textComponent("Q") }, 0);

      expect(result.text).toBe("");
      expect(result.estimatedCost).toBe(0);
      expect(result.omitted).toEqual(["user_query"]);
    });

    it("treats inherited object properties in the order as absent", () => {
      const result = createAssembler().assembleDetailed(
        { user_query: textComponent("Hi"), system_message: textComponent("Be kind.") },
        100,
        ["constructor", "user_query", "toString", "system_message"],
      );

      expect(result.text).toBe("User: Hi\n\nBe kind.");
      expect(result.included).toEqual(["user_query", "system_message"]);
      expect(result.skipped).toEqual(["constructor", "toString"]);
      expect(result.omitted).toEqual([]);
    });

    it("gives own components named like object properties no inherited prefix", () => {
      const text = createAssembler().assemble({ toString: textComponent("plain") }, 100, ["toString"]);

      expect(text).toBe("plain");
    });

    it("falls back to the character estimate when the estimate throws", () => {
      const { logger, messages } = createTestLogger(4);
      const assembler = createAssembler({
        estimate: createFailingTokenizer("tokenizer down"),
        logger,
      });

      const result = assembler.assembleDetailed(
        { system_message: textComponent("You are helpful."), user_query: textComponent("Hi") },
        100,
      );

      expect(result.text).toBe("User: Hi\n\nYou are helpful.");
      expect(result.estimatedCost).toBe(7);
      expect(messages()).toEqual(["Tokenizer failed (tokenizer down); using 4 chars/token estimate"]);
    });

    it("processes duplicate keys once", () => {
      const result = createAssembler().assembleDetailed(
        { user_query: textComponent("Q") },
        100,
        ["user_query", "user_query"],
      );

      expect(result.text).toBe("User: Q");
      expect(result.included).toEqual(["user_query"]);
    });

    it("ignores components missing from the priority order", () => {
      const text = createAssembler().assemble(
        { user_query: textComponent("Q"), extra: textComponent("ignored") },
        100,
      );

      expect(text).toBe("User: Q");
    });

    it("is deterministic", () => {
      const assembler = createAssembler();
      const components = {
        user_query: textComponent("What changed?"),
        history: conversation,
        retrieved_knowledge: textComponent("Release notes for version two."),
      };

      expect(assembler.assembleDetailed(components, 20)).toEqual(
        assembler.assembleDetailed(components, 20),
      );
    });

    it("never exceeds the budget", () => {
      const assembler = createAssembler();
      const components = {
        system_message: textComponent("You answer questions about orders."),
        user_query: textComponent("Where is my parcel?"),
        task_instructions: textComponent("Cite the tracking number."),
        history: conversation,
        retrieved_knowledge: textComponent("Parcel 42 left the depot on Monday."),
      };

      for (let budget = 0; budget <= 60; budget++) {
        const result = assembler.assembleDetailed(components, budget);
        expect(result.estimatedCost).toBeLessThanOrEqual(budget);
        expect(result.estimatedCost).toBe(
          result.text.length === 0 ? 0 : Math.ceil(result.text.length / 4),
        );
      }
    });
  });

  describe("hard truncation", () => {
    // Word count, plus a large penalty once components are joined
    const nonAdditive = (text: string) => words(text) + (text.includes("\n\n") ? 50 : 0);

    it("cuts the joined prompt when step-wise estimates were too optimistic", () => {
      const { logger, messages } = createTestLogger(4);
      const assembler = createAssembler({ estimate: nonAdditive, logger });

      const result = assembler.assembleDetailed(
        { user_query: textComponent("Q"), system_message: textComponent("S s") },
        5,
      );

      expect(result.text).toBe("User: Q");
      expect(result.estimatedCost).toBe(2);
      expect(result.hardTruncated).toBe(true);
      expect(result.included).toEqual(["user_query", "system_message"]);
      expect(messages("error")).toEqual([
        "Assembled prompt estimated at 54 tokens exceeds budget 5 (component estimates are not additive); hard-truncating",
      ]);
      expect(messages("warn")).toEqual(["Forcefully truncated entire prompt to 7 chars after bisection"]);
    });
  });

  describe("configuration", () => {
    it("uses custom prefixes, critical keys and default order", () => {
      const assembler = createAssembler({
        priorityOrder: ["system_message", "user_query"],
        prefixes: { system_message: "System: " },
        criticalKeys: [],
      });

      expect(
        assembler.assemble({ system_message: textComponent("Be kind."), user_query: textComponent("Hi") }, 100),
      ).toBe("System: Be kind.\n\nUser: Hi");
      expect(assembler.assemble({ user_query: textComponent("A long question") }, 1)).toBe("");
    });

    it("rejects non-positive character ratios", () => {
      expect(() => createAssembler({ criticalCharsPerToken: 0 })).toThrow(
        "criticalCharsPerToken: must be a positive number, got 0",
      );
    });
  });
});
