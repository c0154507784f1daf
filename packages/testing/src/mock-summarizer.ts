/**
 * MockSummarizer - scriptable summarizer for condensation tests.
 *
 * @example
 * ```typescript
 * const mock = new MockSummarizer().returns("Short summary.");
 * const engine = new CondensationEngine({ summarizer: mock.summarize });
 *
 * await engine.condense(longText, 50, { relevanceHint: "billing" });
 * expect(mock.calls[0]).toEqual({ text: longText, targetTokens: 50, relevanceHint: "billing" });
 * ```
 */

import type { Summarizer } from "promptfit";

export interface SummarizerCall {
  text: string;
  targetTokens: number;
  relevanceHint?: string;
}

type Behavior =
  | { kind: "fixed"; output: string }
  | { kind: "echo" }
  | { kind: "throw"; message: string }
  | { kind: "reject"; message: string };

export class MockSummarizer {
  readonly calls: SummarizerCall[] = [];
  private behavior: Behavior = { kind: "fixed", output: "Summary." };
  private delayMs = 0;

  /** Return `output` for every call */
  returns(output: string): this {
    this.behavior = { kind: "fixed", output };
    return this;
  }

  /** Return the input unchanged, which always overshoots */
  echoes(): this {
    this.behavior = { kind: "echo" };
    return this;
  }

  /** Throw synchronously */
  throws(message = "Summarizer failed"): this {
    this.behavior = { kind: "throw", message };
    return this;
  }

  /** Return a rejected promise */
  rejects(message = "Summarizer failed"): this {
    this.behavior = { kind: "reject", message };
    return this;
  }

  /** Resolve after `ms` milliseconds */
  withDelay(ms: number): this {
    this.delayMs = ms;
    return this;
  }

  get callCount(): number {
    return this.calls.length;
  }

  reset(): void {
    this.calls.length = 0;
    this.behavior = { kind: "fixed", output: "Summary." };
    this.delayMs = 0;
  }

  readonly summarize: Summarizer = (text, targetTokens, relevanceHint) => {
    this.calls.push({ text, targetTokens, relevanceHint });

    const behavior = this.behavior;
    switch (behavior.kind) {
      case "throw":
        throw new Error(behavior.message);
      case "reject":
        return Promise.reject(new Error(behavior.message));
      case "echo":
      case "fixed": {
        const output = behavior.kind === "echo" ? text : behavior.output;
        if (this.delayMs > 0) {
          const delay = this.delayMs;
          return new Promise<string>((resolve) => setTimeout(() => resolve(output), delay));
        }
        return output;
      }
    }
  };
}
