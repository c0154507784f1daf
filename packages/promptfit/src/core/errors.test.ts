import { describe, expect, it } from "vitest";
import {
  assertPositiveRatio,
  assertTokenCount,
  PromptfitConfigError,
  PromptfitError,
  toError,
} from "./errors.js";

describe("PromptfitConfigError", () => {
  it("prefixes the message with the option name", () => {
    const error = new PromptfitConfigError("must be positive", "maxTokens");

    expect(error.message).toBe("maxTokens: must be positive");
    expect(error.option).toBe("maxTokens");
    expect(error.name).toBe("PromptfitConfigError");
    expect(error).toBeInstanceOf(PromptfitError);
  });

  it("uses the bare message without an option", () => {
    expect(new PromptfitConfigError("bad").message).toBe("bad");
  });
});

describe("toError", () => {
  it("passes errors through", () => {
    const error = new Error("boom");

    expect(toError(error)).toBe(error);
  });

  it("wraps strings and other values", () => {
    expect(toError("boom").message).toBe("boom");
    expect(toError({ code: 7 }).message).toBe('{"code":7}');
  });
});

describe("assertions", () => {
  it("accepts non-negative integer token counts", () => {
    expect(() => assertTokenCount(0, "maxTokens")).not.toThrow();
    expect(() => assertTokenCount(-1, "maxTokens")).toThrow(
      "maxTokens: must be a non-negative integer, got -1",
    );
    expect(() => assertTokenCount(Number.NaN, "maxTokens")).toThrow(PromptfitConfigError);
  });

  it("accepts positive finite ratios", () => {
    expect(() => assertPositiveRatio(0.5, "ratio")).not.toThrow();
    expect(() => assertPositiveRatio(0, "ratio")).toThrow("ratio: must be a positive number, got 0");
    expect(() => assertPositiveRatio(Number.POSITIVE_INFINITY, "ratio")).toThrow(PromptfitConfigError);
  });
});
