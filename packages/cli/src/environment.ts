import { createLogger, type LoggerOptions, parseLogLevel } from "promptfit";
import type { ILogObj, Logger } from "tslog";

/**
 * Readable input that may know whether it is an interactive terminal.
 */
export type TTYAwareStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Logger settings taken from `--log-level` or `[global].log-level`.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/**
 * Everything a command touches outside its arguments. Tests pass their own.
 */
export interface CLIEnvironment {
  argv: string[];
  stdin: TTYAwareStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  /** Whether stdin is a TTY (interactive terminal) */
  isTTY: boolean;
}

/**
 * Creates per-command loggers.
 *
 * Command output goes to stdout, so log lines go to `stream` (stderr by
 * default) where they cannot end up inside a prompt. The configured level
 * wins over PROMPTFIT_LOG_LEVEL; unknown level names are ignored.
 */
export function createLoggerFactory(
  config?: CLILoggerConfig,
  stream: NodeJS.WritableStream = process.stderr,
): (name: string) => Logger<ILogObj> {
  const minLevel = parseLogLevel(config?.logLevel);

  return (name: string) => {
    const options: LoggerOptions = { name, stream };
    if (minLevel !== undefined) {
      options.minLevel = minLevel;
    }
    return createLogger(options);
  };
}

/**
 * The environment of a real run, on the process streams.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig, process.stderr),
    isTTY: Boolean(process.stdin.isTTY),
  };
}
