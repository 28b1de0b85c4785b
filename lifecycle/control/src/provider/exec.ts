// provider/exec.ts - Command Execution
// Every component that runs an external tool (terraform, ssh, scp, tar)
// goes through an ExecFunction so tests never spawn real processes.

import { spawn } from "node:child_process";
import { TimeoutError } from "@zathras/contracts";

// =============================================================================
// Types
// =============================================================================

export interface ExecOptions {
  /** Milliseconds before the process is killed with SIGKILL (default 30s) */
  timeout?: number;
  cwd?: string;
  env?: Record<string, string>;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Signature for the low-level command executor.
 * Can be overridden in tests to avoid spawning real processes.
 */
export type ExecFunction = (command: string[], options?: ExecOptions) => Promise<ExecResult>;

/** Raised when a command was force-killed after its timeout elapsed */
export class CommandTimeoutError extends TimeoutError {
  constructor(
    readonly command: string[],
    readonly timeoutMs: number
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command.join(" ")}`, {
      code: "COMMAND_TIMEOUT",
      details: { command, timeoutMs },
    });
    this.name = "CommandTimeoutError";
  }
}

// =============================================================================
// Real Implementation
// =============================================================================

/**
 * Execute a command with optional timeout. This is the real implementation
 * used when no exec function is injected.
 */
export function realExec(command: string[], options?: ExecOptions): Promise<ExecResult> {
  const timeout = options?.timeout ?? 30_000;
  const [file, ...args] = command;
  if (file === undefined) return Promise.reject(new Error("Empty command"));

  return new Promise<ExecResult>((resolve, reject) => {
    const proc = spawn(file, args, {
      cwd: options?.cwd,
      env: options?.env ? { ...process.env, ...options.env } : process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, timeout);

    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    proc.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new CommandTimeoutError(command, timeout));
        return;
      }
      resolve({
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
        exitCode: code ?? 1,
      });
    });
  });
}

// =============================================================================
// Sleep
// =============================================================================

export type SleepFunction = (ms: number) => Promise<void>;

export const realSleep: SleepFunction = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
