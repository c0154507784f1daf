import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable, Writable } from "node:stream";
import { createLogger } from "promptfit";
import type { CLIEnvironment } from "./environment.js";

/**
 * Helper to create a readable stream.
 */
export function createReadable(content: string, { isTTY = false } = {}) {
  return Object.assign(Readable.from([content]), { isTTY });
}

/**
 * Helper to create a writable stream that captures output.
 */
export function createWritable() {
  let data = "";
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      data += chunk.toString();
      callback();
    },
  });
  return { stream, read: () => data };
}

export interface TestEnv {
  env: CLIEnvironment;
  stdout: () => string;
  stderr: () => string;
  exitCode: () => number | undefined;
}

/**
 * Helper to create a minimal CLI environment for testing.
 */
export function createEnv(args: string[], stdinContent = "", stdinIsTTY = false): TestEnv {
  const stdout = createWritable();
  const stderr = createWritable();
  let code: number | undefined;

  return {
    env: {
      argv: ["node", "promptfit", ...args],
      stdin: createReadable(stdinContent, { isTTY: stdinIsTTY }),
      stdout: stdout.stream,
      stderr: stderr.stream,
      setExitCode: (value) => {
        code = value;
      },
      createLogger: (name: string) => createLogger({ type: "hidden", name }),
      isTTY: stdinIsTTY,
    },
    stdout: stdout.read,
    stderr: stderr.read,
    exitCode: () => code,
  };
}

/**
 * Writes `content` to a fresh temporary directory and returns the path.
 */
export function writeTempFile(name: string, content: string): string {
  const dir = mkdtempSync(join(tmpdir(), "promptfit-cli-"));
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}
