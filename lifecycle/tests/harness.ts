// tests/harness.ts - Shared test lifecycle management
//
// Clears global singletons between tests and gives each test its own
// scratch directory. Every test file should use this instead of
// hand-rolled beforeEach/afterEach hooks.

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { zipSync } from "fflate";
import * as tar from "tar";
import { clearAllProviders, getProvider } from "../control/src/provider/registry";
import { clearConfigCache } from "../control/src/provider/config";
import type { ExecFunction, ExecOptions, ExecResult } from "../control/src/provider/exec";
import type { RunDeps } from "../control/src/workflow/context";
import { resolveRun, type RunConfiguration } from "../control/src/config/resolver";

export interface TestEnv {
  /** Scratch directory removed on cleanup */
  dir: string;
  cleanup: () => void;
}

/**
 * Set up a clean test environment. Call in beforeEach().
 *
 * Usage:
 *   let env: TestEnv;
 *   beforeEach(() => { env = setupTest(); });
 *   afterEach(() => env.cleanup());
 */
export function setupTest(): TestEnv {
  clearAllProviders();
  clearConfigCache();
  const dir = mkdtempSync(join(tmpdir(), "zathras-test-"));
  const savedConfig = process.env.ZATHRAS_PROVIDERS_CONFIG;
  // Built-in cloud defaults only; never the developer's own file
  process.env.ZATHRAS_PROVIDERS_CONFIG = join(dir, "providers.yml");
  return {
    dir,
    cleanup: () => {
      clearAllProviders();
      clearConfigCache();
      if (savedConfig === undefined) delete process.env.ZATHRAS_PROVIDERS_CONFIG;
      else process.env.ZATHRAS_PROVIDERS_CONFIG = savedConfig;
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function writeFile(root: string, rel: string, content: string | Uint8Array): string {
  const path = join(root, rel);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

// =============================================================================
// Scripted Exec
// =============================================================================

export interface ExecCall {
  command: string[];
  options?: ExecOptions;
}

type ExecReply = Partial<ExecResult> | ((call: ExecCall) => Partial<ExecResult> | Promise<Partial<ExecResult>>);

/**
 * Records every command and answers from a list of rules; the most
 * recently added matching rule wins. Unmatched commands succeed with
 * empty output.
 */
export class FakeExec {
  readonly calls: ExecCall[] = [];
  private rules: Array<{ match: (line: string) => boolean; reply: ExecReply }> = [];

  on(match: string | RegExp, reply: ExecReply): this {
    const test = typeof match === "string" ? (line: string) => line.includes(match) : (line: string) => match.test(line);
    this.rules.unshift({ match: test, reply });
    return this;
  }

  readonly exec: ExecFunction = async (command, options) => {
    const call: ExecCall = { command, options };
    this.calls.push(call);
    const line = command.join(" ");
    const rule = this.rules.find((r) => r.match(line));
    const reply = rule ? (typeof rule.reply === "function" ? await rule.reply(call) : rule.reply) : {};
    return { stdout: "", stderr: "", exitCode: 0, ...reply };
  };

  /** Remote command strings of every ssh call, in order */
  remoteCommands(): string[] {
    return this.calls.filter((c) => c.command[0] === "ssh").map((c) => c.command[c.command.length - 1] ?? "");
  }

  lines(): string[] {
    return this.calls.map((c) => c.command.join(" "));
  }
}

// =============================================================================
// Run Dependencies
// =============================================================================

export function testDeps(exec: FakeExec, overrides: Partial<RunDeps> = {}): RunDeps {
  let clock = Date.UTC(2024, 0, 15, 12, 0, 0);
  return {
    exec: exec.exec,
    sleep: async () => {},
    now: () => {
      clock += 1000;
      return clock;
    },
    fetchSource: async (_url, dest) => {
      writeFileSync(dest, "wrapper archive");
    },
    getProvider,
    ...overrides,
  };
}

// =============================================================================
// Configurations
// =============================================================================

/** Local host config file under <dir>/local_configs */
export function writeLocalHost(dir: string, host: string, content = "storage: none\n"): string {
  return writeFile(dir, `local_configs/${host}.config`, content);
}

/** Resolve a single system from command-line style options rooted at dir */
export function makeConfig(dir: string, cli: Record<string, unknown>): RunConfiguration {
  const resolved = resolveRun({ cli, cwd: dir });
  const config = resolved.groups[0]?.[0];
  if (!config) throw new Error("no system resolved");
  return config;
}

// =============================================================================
// Result Archives
// =============================================================================

/**
 * Write results_<test>.zip the way wrappers do: a zip holding
 * results_<test>_.tar, which holds <test>_<stamp>/test_results_report.
 * A null report leaves the file out.
 */
export function writeResultZip(dir: string, test: string, report: string | null, dest: string): string {
  const stage = mkdtempSync(join(dir, "stage-"));
  const inner = `${test}_2024.01.15-12.00.00`;
  writeFile(stage, `${inner}/results_${test}.csv`, "metric,value\ncopy,1000\n");
  if (report !== null) writeFile(stage, `${inner}/test_results_report`, report);

  const tarPath = join(stage, `results_${test}_.tar`);
  tar.c({ sync: true, file: tarPath, cwd: stage }, [inner]);
  const zip = zipSync({ [`results_${test}_.tar`]: new Uint8Array(readFileSync(tarPath)) });
  mkdirSync(dirname(dest), { recursive: true });
  writeFileSync(dest, zip);
  rmSync(stage, { recursive: true, force: true });
  return dest;
}
