import { spawn } from "node:child_process";
import { DEFAULT_TOOL_TIMEOUT_MS } from "../config.ts";
import { ToolUnavailableError } from "./errors.ts";

export interface SpawnWithTimeoutOptions {
  command: string[];
  timeout?: number;
}

export interface SpawnResult {
  stdout: Buffer;
  stderr: Buffer;
  exitCode: number;
  timedOut: boolean;
}

const KILL_GRACE_MS = 1000;

function isMissingExecutable(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

export function spawnWithTimeout(options: SpawnWithTimeoutOptions): Promise<SpawnResult> {
  const { command, timeout = DEFAULT_TOOL_TIMEOUT_MS } = options;
  const [executable, ...args] = command;
  if (!executable) {
    return Promise.reject(new Error("Empty command"));
  }

  return new Promise((resolve, reject) => {
    const proc = spawn(executable, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
      // Process may already be gone; kill() then just returns false
      setTimeout(() => proc.kill("SIGKILL"), KILL_GRACE_MS).unref();
    }, timeout);

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", (error) => {
      clearTimeout(timeoutId);
      reject(isMissingExecutable(error) ? new ToolUnavailableError(executable, error) : error);
    });

    proc.on("close", (code) => {
      clearTimeout(timeoutId);
      if (timedOut) {
        resolve({ stdout: Buffer.alloc(0), stderr: Buffer.alloc(0), exitCode: -1, timedOut: true });
        return;
      }
      resolve({
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
        exitCode: code ?? -1,
        timedOut: false,
      });
    });
  });
}

/** True when `command` runs and exits cleanly */
export async function isToolAvailable(command: string[], timeout?: number): Promise<boolean> {
  try {
    const result = await spawnWithTimeout({ command, timeout });
    return result.exitCode === 0;
  } catch (error) {
    if (error instanceof ToolUnavailableError) return false;
    throw error;
  }
}
