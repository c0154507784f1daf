import { createFailingTokenizer, createTestLogger, createWordTokenizer } from "@promptfit/testing";
import { describe, expect, it, vi } from "vitest";
import { PromptfitConfigError } from "../core/errors.js";
import {
  chunkByTokens,
  createTokenEstimator,
  estimateTokens,
  guardEstimator,
} from "./estimator.js";

const words = createWordTokenizer();

describe("estimateTokens", () => {
  it("returns ceil(length / 4)", () => {
    expect(estimateTokens("Hello")).toBe(2);
    expect(estimateTokens("World")).toBe(2);
    expect(estimateTokens("This is a test")).toBe(4);
    expect(estimateTokens("abcd")).toBe(1);
  });

  it("returns 0 for empty text", () => {
    expect(estimateTokens("")).toBe(0);
  });
});

describe("createTokenEstimator", () => {
  it("uses the character approximation without a tokenizer", () => {
    const estimate = createTokenEstimator({ charsPerToken: 2 });

    expect(estimate("abcde")).toBe(3);
  });

  it("rejects a non-positive charsPerToken", () => {
    expect(() => createTokenEstimator({ charsPerToken: 0 })).toThrow(PromptfitConfigError);
  });

  it("prefers the tokenizer and rounds its count up", () => {
    expect(createTokenEstimator({ tokenizer: words })("one two three")).toBe(3);
    expect(createTokenEstimator({ tokenizer: () => 2.4 })("anything")).toBe(3);
  });

  it("returns 0 for empty text without calling the tokenizer", () => {
    const tokenizer = vi.fn(() => 7);
    const estimate = createTokenEstimator({ tokenizer });

    expect(estimate("")).toBe(0);
    expect(tokenizer).not.toHaveBeenCalled();
  });

  it("falls back when the tokenizer throws, warning only once", () => {
    const { logger, messages } = createTestLogger();
    const estimate = createTokenEstimator({ tokenizer: createFailingTokenizer("boom"), logger });

    expect(estimate("abcdefgh")).toBe(2);
    expect(estimate("abcdefghi")).toBe(3);

    expect(messages("warn")).toEqual(["Tokenizer failed (boom); using 4 chars/token estimate"]);
    expect(messages("debug")).toEqual([
      "Tokenizer failed (boom); using 4 chars/token estimate [failure #2]",
    ]);
  });

  it("falls back when the tokenizer returns a negative or non-finite count", () => {
    const { logger, messages } = createTestLogger();
    const estimate = createTokenEstimator({ tokenizer: () => Number.NaN, logger });

    expect(estimate("Hello")).toBe(2);
    expect(messages()).toEqual(["Tokenizer failed (returned NaN); using 4 chars/token estimate"]);

    expect(createTokenEstimator({ tokenizer: () => -1, logger })("Hello")).toBe(2);
  });
});

describe("guardEstimator", () => {
  it("returns the default estimate when none is given", () => {
    expect(guardEstimator(undefined)).toBe(estimateTokens);
  });

  it("returns estimators that already fall back unchanged", () => {
    const estimate = createTokenEstimator({ tokenizer: words });

    expect(guardEstimator(estimate)).toBe(estimate);
    expect(guardEstimator(estimateTokens)).toBe(estimateTokens);
  });

  it("wraps a plain cost function so that failures fall back", () => {
    const { logger, messages } = createTestLogger();
    const estimate = guardEstimator(createFailingTokenizer("tokenizer down"), logger);

    expect(estimate("some text")).toBe(3);
    expect(messages("warn")).toEqual([
      "Tokenizer failed (tokenizer down); using 4 chars/token estimate",
    ]);
  });

  it("passes well-behaved counts through", () => {
    expect(guardEstimator(words)("one two three")).toBe(3);
  });
});

describe("chunkByTokens", () => {
  it("packs whole words greedily", () => {
    expect(chunkByTokens("alpha beta gamma delta", 3)).toEqual(["alpha beta", "gamma delta"]);
  });

  it("normalizes whitespace between words", () => {
    expect(chunkByTokens("  one\n\ntwo\tthree ", 100)).toEqual(["one two three"]);
  });

  it("keeps an oversized word as its own chunk", () => {
    expect(chunkByTokens("supercalifragilistic ok", 2)).toEqual(["supercalifragilistic", "ok"]);
  });

  it("returns no chunks for blank text", () => {
    expect(chunkByTokens("   ", 5)).toEqual([]);
  });

  it("uses the given estimator", () => {
    expect(chunkByTokens("a b c d e", 2, words)).toEqual(["a b", "c d", "e"]);
  });
});
