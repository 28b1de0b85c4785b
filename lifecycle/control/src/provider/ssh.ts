// provider/ssh.ts - SSH / SCP Sessions to Systems Under Test

import { TIMING } from "@zathras/contracts";
import type { SystemType } from "@zathras/contracts";
import { ConcreteProviderError } from "./errors";
import type { ExecFunction, ExecResult, SleepFunction } from "./exec";

// =============================================================================
// Types
// =============================================================================

export interface SshTarget {
  host: string;
  user: string;
  keyFile: string | null;
}

/** ssh and scp both exit 255 on connection-level failures */
const SSH_CONNECTION_FAILURE = 255;

// =============================================================================
// Argument Construction
// =============================================================================

/** Single-quote for a POSIX shell */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function commonOptions(target: SshTarget): string[] {
  const opts = [
    "-o", "StrictHostKeyChecking=no",
    "-o", "UserKnownHostsFile=/dev/null",
    "-o", "LogLevel=ERROR",
    "-o", `ConnectTimeout=${TIMING.SSH_CONNECT_TIMEOUT_S}`,
    "-o", "BatchMode=yes",
  ];
  if (target.keyFile) opts.push("-i", target.keyFile);
  return opts;
}

export function sshCommand(target: SshTarget, remoteCommand: string): string[] {
  return ["ssh", ...commonOptions(target), `${target.user}@${target.host}`, remoteCommand];
}

export function scpToCommand(target: SshTarget, localPath: string, remotePath: string): string[] {
  return ["scp", ...commonOptions(target), "-r", localPath, `${target.user}@${target.host}:${remotePath}`];
}

export function scpFromCommand(target: SshTarget, remotePath: string, localPath: string): string[] {
  return ["scp", ...commonOptions(target), `${target.user}@${target.host}:${remotePath}`, localPath];
}

// =============================================================================
// Session
// =============================================================================

/**
 * Commands against one system. A connection-level failure (exit 255) raises
 * CONNECTION_LOST so callers can tell a dead host from a failing command.
 */
export class SshSession {
  constructor(
    readonly target: SshTarget,
    private readonly provider: SystemType,
    private readonly exec: ExecFunction,
    private readonly sleep: SleepFunction
  ) {}

  async run(command: string, options?: { timeout?: number }): Promise<ExecResult> {
    const result = await this.exec(sshCommand(this.target, command), {
      timeout: options?.timeout ?? TIMING.SSH_COMMAND_TIMEOUT_MS,
    });
    if (result.exitCode === SSH_CONNECTION_FAILURE) {
      throw this.connectionLost(command, result);
    }
    return result;
  }

  /** Run and require exit 0; returns stdout */
  async check(command: string, options?: { timeout?: number }): Promise<string> {
    const result = await this.run(command, options);
    if (result.exitCode !== 0) {
      throw new ConcreteProviderError(this.provider, "PROVIDER_INTERNAL",
        `Remote command failed (exit ${result.exitCode}): ${command}: ${result.stderr.trim()}`,
        { details: { host: this.target.host, command, exitCode: result.exitCode } }
      );
    }
    return result.stdout;
  }

  async copyTo(localPath: string, remotePath: string): Promise<void> {
    const result = await this.exec(scpToCommand(this.target, localPath, remotePath), {
      timeout: TIMING.SSH_COMMAND_TIMEOUT_MS,
    });
    this.assertTransfer(result, `${localPath} -> ${remotePath}`);
  }

  async copyFrom(remotePath: string, localPath: string): Promise<void> {
    const result = await this.exec(scpFromCommand(this.target, remotePath, localPath), {
      timeout: TIMING.SSH_COMMAND_TIMEOUT_MS,
    });
    this.assertTransfer(result, `${remotePath} -> ${localPath}`);
  }

  /** Single reachability check */
  async isReachable(): Promise<boolean> {
    const result = await this.exec(sshCommand(this.target, "true"), {
      timeout: (TIMING.SSH_CONNECT_TIMEOUT_S + 5) * 1000,
    });
    return result.exitCode === 0;
  }

  /** Poll with a fixed delay until the host answers, or give up */
  async waitReachable(retries: number, delayMs: number): Promise<boolean> {
    for (let i = 0; i < retries; i++) {
      if (await this.isReachable()) return true;
      if (i < retries - 1) await this.sleep(delayMs);
    }
    return false;
  }

  /** Reboot and wait for the host to come back */
  async reboot(): Promise<void> {
    // The connection drops mid-command; exit status is meaningless here.
    await this.exec(sshCommand(this.target, "sudo systemctl reboot || sudo reboot"), {
      timeout: (TIMING.SSH_CONNECT_TIMEOUT_S + 5) * 1000,
    });
    await this.sleep(TIMING.REBOOT_SETTLE_MS);
    const back = await this.waitReachable(TIMING.REBOOT_RETRIES, TIMING.REBOOT_POLL_INTERVAL_MS);
    if (!back) {
      throw new ConcreteProviderError(this.provider, "UNREACHABLE",
        `${this.target.host} did not come back after reboot`,
        { details: { host: this.target.host } }
      );
    }
  }

  private assertTransfer(result: ExecResult, what: string): void {
    if (result.exitCode === SSH_CONNECTION_FAILURE) throw this.connectionLost(what, result);
    if (result.exitCode !== 0) {
      throw new ConcreteProviderError(this.provider, "PROVIDER_INTERNAL",
        `Copy failed (exit ${result.exitCode}): ${what}: ${result.stderr.trim()}`,
        { details: { host: this.target.host } }
      );
    }
  }

  private connectionLost(what: string, result: ExecResult): ConcreteProviderError {
    return new ConcreteProviderError(this.provider, "CONNECTION_LOST",
      `Lost connection to ${this.target.host} during: ${what}`,
      { retryable: true, details: { host: this.target.host, stderr: result.stderr.trim() } }
    );
  }
}
