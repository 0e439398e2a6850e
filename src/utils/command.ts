import { spawn, execFileSync, type ChildProcess } from "child_process";
import type { CommandResult } from "../types/index.js";

/** Default command execution timeout in milliseconds (30s) */
export const COMMAND_TIMEOUT_MS = 30_000;
/** Max combined stdout/stderr size in bytes (16MB) */
export const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface RunOptions {
  /** Written to the child's stdin, which is then closed */
  input?: string;
  timeoutMs?: number;
  /** Output past this kills the child and fails the call rather than truncating */
  maxOutputBytes?: number;
}

export function commandExists(bin: string): boolean {
  try {
    execFileSync("which", [bin], { stdio: "pipe" });
    return true;
  } catch {
    return false;
  }
}

/** Fixed locale so rule listings do not depend on the operator's shell. */
export function commandEnv(): NodeJS.ProcessEnv {
  return { ...process.env, LC_ALL: "C" };
}

function killChild(child: ChildProcess): void {
  try {
    child.kill("SIGTERM");
    // Force kill after 2s if still alive
    setTimeout(() => {
      try { child.kill("SIGKILL"); } catch { /* already dead */ }
    }, 2000).unref();
  } catch { /* already dead */ }
}

/**
 * Run a command without a shell. Never rejects: spawn errors and timeouts
 * resolve with a non-zero code and the reason in stderr.
 */
export function runCommand(
  bin: string,
  args: string[],
  options: RunOptions = {},
): Promise<CommandResult> {
  const timeoutMs = options.timeoutMs ?? COMMAND_TIMEOUT_MS;
  const maxOutputBytes = options.maxOutputBytes ?? MAX_OUTPUT_BYTES;

  return new Promise((resolve) => {
    let settled = false;
    let stdout = "";
    let stderr = "";
    let outputBytes = 0;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const child = spawn(bin, args, {
      stdio: ["pipe", "pipe", "pipe"],
      env: commandEnv(),
    });

    const timer = setTimeout(() => {
      killChild(child);
      finish({ code: 1, stdout, stderr: stderr || `${bin} timed out after ${timeoutMs / 1000}s` });
    }, timeoutMs);

    const collect = (chunk: string): boolean => {
      if (settled) return false;
      outputBytes += Buffer.byteLength(chunk);
      if (outputBytes <= maxOutputBytes) return true;
      killChild(child);
      finish({ code: 1, stdout, stderr: `${bin} output exceeded ${maxOutputBytes} bytes` });
      return false;
    };

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      if (collect(chunk)) stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      if (collect(chunk)) stderr += chunk;
    });
    child.on("close", (code) => finish({ code: code ?? 1, stdout, stderr }));
    child.on("error", (err) => finish({ code: 1, stdout: "", stderr: err.message }));

    if (child.stdin) {
      // EPIPE when the child exits before reading its input
      child.stdin.on("error", (err) => {
        if (!stderr) stderr = err.message;
      });
      child.stdin.end(options.input ?? "");
    }
  });
}

export function describeFailure(result: CommandResult): string {
  const stderr = result.stderr.trim();
  return stderr ? stderr : `exit code ${result.code}`;
}
