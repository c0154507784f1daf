/**
 * ObservabilitySink - bounded, append-only log of recent operational events.
 *
 * A sink is passed by reference to whatever needs "what just happened"
 * (for example a prompt component describing recent activity). Loggers feed
 * it through a tslog transport registered with {@link attachSink}.
 */

import type { ILogObj, Logger } from "tslog";
import { DEFAULT_SINK_CAPACITY } from "../core/constants.js";
import { PromptfitConfigError } from "../core/errors.js";

/**
 * One recorded event.
 */
export interface SinkEntry {
  /** Upper-case level name, e.g. "WARN" */
  level: string;
  /** Name of the logger that produced the entry, when known */
  name?: string;
  message: string;
  timestamp: Date;
}

/**
 * Fixed-capacity ring buffer of {@link SinkEntry} values.
 *
 * @example
 * ```typescript
 * const sink = new ObservabilitySink(50);
 * attachSink(logger, sink);
 *
 * logger.warn("Summarizer failed");
 * sink.render(); // "[WARN] Summarizer failed"
 * ```
 */
export class ObservabilitySink {
  private readonly buffer: SinkEntry[] = [];

  constructor(readonly capacity: number = DEFAULT_SINK_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new PromptfitConfigError(`must be a positive integer, got ${capacity}`, "capacity");
    }
  }

  append(entry: SinkEntry): void {
    this.buffer.push({ ...entry });
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
    }
  }

  /**
   * Records a message at the given level with the current time.
   */
  record(level: string, message: string, name?: string): void {
    this.append({ level: level.toUpperCase(), name, message, timestamp: new Date() });
  }

  /**
   * All entries, oldest first.
   */
  entries(): SinkEntry[] {
    return this.buffer.map((entry) => ({ ...entry }));
  }

  /**
   * The newest `count` entries, oldest first.
   */
  recent(count: number): SinkEntry[] {
    if (count <= 0) return [];
    return this.entries().slice(-count);
  }

  /**
   * Renders entries as "[LEVEL] message" lines for inclusion in a prompt.
   */
  render(count?: number): string {
    const selected = count === undefined ? this.entries() : this.recent(count);
    return selected.map((entry) => `[${entry.level}] ${entry.message}`).join("\n");
  }

  get size(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer.length = 0;
  }
}

function describeArgument(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  // tslog hands transports errors as { nativeError, name, message, stack }
  if (typeof value === "object" && value !== null && "nativeError" in value) {
    if (value.nativeError instanceof Error) return value.nativeError.message;
  }
  if (value === undefined) return "undefined";
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function readMeta(meta: unknown): { level: string; name?: string; timestamp: Date } {
  let level = "INFO";
  let name: string | undefined;
  let timestamp = new Date();

  if (typeof meta === "object" && meta !== null) {
    if ("logLevelName" in meta && typeof meta.logLevelName === "string") {
      level = meta.logLevelName.toUpperCase();
    }
    if ("name" in meta && typeof meta.name === "string") {
      name = meta.name;
    }
    if ("date" in meta && meta.date instanceof Date) {
      timestamp = meta.date;
    }
  }

  return { level, name, timestamp };
}

/**
 * Copies every record the logger emits into the sink.
 *
 * Only records at or above the logger's `minLevel` reach transports.
 */
export function attachSink(logger: Logger<ILogObj>, sink: ObservabilitySink): void {
  const metaProperty = logger.settings.metaProperty;

  logger.attachTransport((logObj: Record<string, unknown>) => {
    const { level, name, timestamp } = readMeta(logObj[metaProperty]);
    const message = Object.keys(logObj)
      .filter((key) => key !== metaProperty)
      .map((key) => describeArgument(logObj[key]))
      .join(" ");

    sink.append({ level, name, message, timestamp });
  });
}
