import { describe, expect, it } from "vitest";
import { InputError, parsePromptDocument, toPromptComponents } from "./input.js";

describe("parsePromptDocument", () => {
  it("parses JSON documents", () => {
    const document = parsePromptDocument(
      JSON.stringify({
        maxTokens: 50,
        components: { user_query: "Hi", history: [{ role: "assistant", content: "Hello" }] },
      }),
      "prompt.json",
    );

    expect(document).toEqual({
      maxTokens: 50,
      components: { user_query: "Hi", history: [{ role: "assistant", content: "Hello" }] },
    });
  });

  it("parses TOML when the source ends in .toml", () => {
    const document = parsePromptDocument('priority = ["user_query"]\n[components]\nuser_query = "Hi"\n', "prompt.TOML");

    expect(document).toEqual({ priority: ["user_query"], components: { user_query: "Hi" } });
  });

  it("rejects unknown top-level fields", () => {
    expect(() => parsePromptDocument(JSON.stringify({ components: {}, budget: 5 }))).toThrow(InputError);
  });

  it("rejects unknown roles", () => {
    expect(() =>
      parsePromptDocument(
        JSON.stringify({ components: { history: [{ role: "tool", content: "x" }] } }),
        "prompt.json",
      ),
    ).toThrow("prompt.json: Invalid prompt document: components.history");
  });

  it("rejects negative budgets", () => {
    expect(() => parsePromptDocument(JSON.stringify({ maxTokens: -1, components: {} }))).toThrow(
      "stdin: Invalid prompt document: maxTokens:",
    );
  });
});

describe("toPromptComponents", () => {
  it("maps strings to text and arrays to history", () => {
    expect(
      toPromptComponents({
        components: { user_query: "Hi", history: [{ role: "user", content: "Hello" }] },
      }),
    ).toEqual({
      user_query: { kind: "text", text: "Hi" },
      history: { kind: "history", turns: [{ role: "user", content: "Hello" }] },
    });
  });
});
