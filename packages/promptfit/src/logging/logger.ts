import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";
import { attachSink, type ObservabilitySink } from "./observability-sink.js";

export const LOG_LEVEL_IDS: Readonly<Record<string, number>> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const DEFAULT_MIN_LEVEL = LOG_LEVEL_IDS.warn;
const DEFAULT_LOGGER_NAME = "promptfit";

/**
 * Parses a level given by name ("debug") or number ("2"); numbers are clamped to 0-6.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LOG_LEVEL_IDS[normalized];
}

function parseEnvBoolean(value?: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn), or PROMPTFIT_LOG_LEVEL
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for development, 'json' for production, 'hidden' for tests
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   * @default 'promptfit'
   */
  name?: string;

  /**
   * Truncate PROMPTFIT_LOG_FILE instead of appending to it.
   * @default false, or PROMPTFIT_LOG_RESET
   */
  logReset?: boolean;

  /**
   * Also copy every emitted record into this sink.
   */
  sink?: ObservabilitySink;

  /**
   * Write pretty output here instead of the console. PROMPTFIT_LOG_FILE
   * takes precedence.
   */
  stream?: NodeJS.WritableStream;
}

// One WriteStream per log file path, shared by all loggers
let sharedLogFilePath: string | undefined;
let sharedLogFileStream: WriteStream | undefined;
let writeErrorCount = 0;
const MAX_WRITE_ERRORS_BEFORE_DISABLE = 5;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Closes the shared log file stream. Used by tests.
 * @internal
 */
export function _resetFileLoggingState(): void {
  sharedLogFileStream?.end();
  sharedLogFileStream = undefined;
  sharedLogFilePath = undefined;
  writeErrorCount = 0;
}

function openLogFile(path: string, reset: boolean): WriteStream | undefined {
  if (sharedLogFileStream && sharedLogFilePath === path) {
    return sharedLogFileStream;
  }

  _resetFileLoggingState();

  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });

    stream.on("error", (error) => {
      writeErrorCount++;
      if (writeErrorCount === 1) {
        console.error(`[promptfit] Log file write error: ${error.message}`);
      }
      if (writeErrorCount >= MAX_WRITE_ERRORS_BEFORE_DISABLE && sharedLogFileStream === stream) {
        console.error(`[promptfit] Too many log file errors (${writeErrorCount}), disabling file logging`);
        _resetFileLoggingState();
      }
    });

    sharedLogFileStream = stream;
    sharedLogFilePath = path;
    return stream;
  } catch (error) {
    console.error("Failed to initialize PROMPTFIT_LOG_FILE output:", error);
    return undefined;
  }
}

/**
 * Create a logger for promptfit components.
 *
 * Priority for every setting: options > environment > default.
 *
 * @example
 * ```typescript
 * // Verbose logger while tuning budgets
 * const logger = createLogger({ minLevel: 2 });
 *
 * // Silent logger for tests, still feeding a sink
 * const sink = new ObservabilitySink();
 * const logger = createLogger({ type: "hidden", sink });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const minLevel =
    options.minLevel ?? parseLogLevel(process.env.PROMPTFIT_LOG_LEVEL) ?? DEFAULT_MIN_LEVEL;
  const type = options.type ?? "pretty";
  const logFile = process.env.PROMPTFIT_LOG_FILE?.trim() ?? "";
  const logReset = options.logReset ?? parseEnvBoolean(process.env.PROMPTFIT_LOG_RESET) ?? false;

  const fileStream = logFile ? openLogFile(logFile, logReset) : undefined;
  const outputStream = fileStream ? undefined : options.stream;

  const logger = new Logger<ILogObj>({
    name: options.name ?? DEFAULT_LOGGER_NAME,
    minLevel,
    // File output reuses the pretty template, redirected below
    type: fileStream ? "pretty" : type,
    hideLogPositionForProduction: Boolean(fileStream) || type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: fileStream
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) => {
            if (sharedLogFileStream !== fileStream) return;
            const args = logArgs.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            fileStream.write(`${stripAnsi(logMetaMarkup)}${args.join(" ")}\n`);
          },
        }
      : outputStream
        ? {
            transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) => {
              const args = logArgs.map((arg) =>
                typeof arg === "string" ? arg : JSON.stringify(arg),
              );
              outputStream.write(`${logMetaMarkup}${args.join(" ")}\n`);
            },
          }
        : undefined,
  });

  if (options.sink) {
    attachSink(logger, options.sink);
  }

  return logger;
}

/**
 * Logger used by components that are not given one.
 */
export const defaultLogger = createLogger();
