// provider/terraform.ts - Terraform CLI Wrapper & Variable Rendering

import { copyFileSync, existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { TIMING } from "@zathras/contracts";
import type { SystemType } from "@zathras/contracts";
import { ConcreteProviderError } from "./errors";
import { CommandTimeoutError, type ExecFunction, type ExecResult } from "./exec";

// =============================================================================
// Templates
// =============================================================================

/** Directory of the shipped per-provider .tf templates */
export const TEMPLATE_ROOT = fileURLToPath(new URL("../../templates/", import.meta.url));

export const VAR_FILE = "env.tfvars";
export const PLAN_FILE = "plan.tfplan";

/** Copy the named template files for a provider into dest */
export function copyTemplates(provider: SystemType, files: string[], dest: string, root = TEMPLATE_ROOT): void {
  mkdirSync(dest, { recursive: true });
  for (const file of files) {
    const src = join(root, provider, file);
    if (!existsSync(src)) {
      throw new ConcreteProviderError(provider, "INVALID_SPEC", `Missing template ${src}`);
    }
    copyFileSync(src, join(dest, file));
  }
}

// =============================================================================
// Variable File Rendering
// =============================================================================

export type TfScalar = string | number | boolean;
export type TfObject = Record<string, TfScalar>;
export type TfValue = TfScalar | string[] | Record<string, string> | TfObject[];

function quote(s: string): string {
  return JSON.stringify(s);
}

function renderScalar(value: TfScalar): string {
  return typeof value === "string" ? quote(value) : String(value);
}

function renderObject(obj: TfObject): string {
  return `{ ${Object.entries(obj).map(([k, v]) => `${k} = ${renderScalar(v)}`).join(", ")} }`;
}

function renderValue(value: TfValue): string {
  if (typeof value !== "object") return renderScalar(value);
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) items.push(typeof item === "string" ? quote(item) : renderObject(item));
    return `[${items.join(", ")}]`;
  }
  const entries = Object.entries(value).map(([k, v]) => `  ${quote(k)} = ${quote(v)}`);
  return entries.length === 0 ? "{}" : `{\n${entries.join("\n")}\n}`;
}

/** Render a .tfvars file; keys are emitted in sorted order */
export function renderTfvars(vars: Record<string, TfValue>): string {
  return Object.keys(vars)
    .sort()
    .map((key) => {
      const value = vars[key];
      return value === undefined ? "" : `${key} = ${renderValue(value)}\n`;
    })
    .join("");
}

export function workspaceName(systemType: SystemType, runLabel: string, system: string): string {
  return `${systemType}-${runLabel}-${system}`.replace(/[^A-Za-z0-9_-]/g, "-");
}

// =============================================================================
// Runner
// =============================================================================

export interface TerraformOutput {
  [name: string]: { value: unknown; type?: unknown; sensitive?: boolean };
}

/** Terraform prints "Error:" blocks even when it exits 0 in some failure paths */
export function isFailedRun(result: ExecResult): boolean {
  return result.exitCode !== 0 || /\bError\b/.test(result.stdout) || /\bError\b/.test(result.stderr);
}

/**
 * Environment terraform needs beyond the caller's own. The IBM plugin reads
 * IC_API_KEY; IBMCLOUD_API_KEY is forwarded under that name.
 */
export function terraformEnvFor(provider: SystemType, env: NodeJS.ProcessEnv = process.env): Record<string, string> | undefined {
  if (provider !== "ibm") return undefined;
  const key = env.IC_API_KEY ?? env.IBMCLOUD_API_KEY;
  return key ? { IC_API_KEY: key } : undefined;
}

export class TerraformRunner {
  constructor(
    private readonly provider: SystemType,
    private readonly exec: ExecFunction,
    private readonly env?: Record<string, string>
  ) {}

  private run(dir: string, args: string[], timeout: number): Promise<ExecResult> {
    return this.exec(["terraform", ...args], { cwd: dir, timeout, env: this.env });
  }

  private fail(step: string, result: ExecResult): never {
    throw new ConcreteProviderError(this.provider, "INFRA_APPLY_FAILED",
      `terraform ${step} failed: ${summarize(result)}`,
      { details: { step, exitCode: result.exitCode } }
    );
  }

  async init(dir: string): Promise<void> {
    const result = await this.run(dir, ["init", "-no-color", "-input=false"], TIMING.INFRA_INIT_TIMEOUT_MS);
    if (isFailedRun(result)) this.fail("init", result);
  }

  async selectWorkspace(dir: string, name: string): Promise<void> {
    const select = await this.run(dir, ["workspace", "select", "-no-color", name], TIMING.INFRA_INIT_TIMEOUT_MS);
    if (select.exitCode === 0) return;
    const created = await this.run(dir, ["workspace", "new", "-no-color", name], TIMING.INFRA_INIT_TIMEOUT_MS);
    if (isFailedRun(created)) this.fail("workspace new", created);
  }

  async plan(dir: string): Promise<void> {
    const result = await this.run(dir,
      ["plan", "-no-color", "-input=false", `-var-file=${VAR_FILE}`, `-out=${PLAN_FILE}`],
      TIMING.INFRA_INIT_TIMEOUT_MS);
    if (isFailedRun(result)) this.fail("plan", result);
  }

  /** Returns the raw result; the provider classifies failures */
  apply(dir: string): Promise<ExecResult> {
    return this.run(dir,
      ["apply", "-no-color", "-input=false", "-auto-approve", PLAN_FILE],
      TIMING.INFRA_APPLY_TIMEOUT_MS);
  }

  async output(dir: string): Promise<TerraformOutput> {
    const result = await this.run(dir, ["output", "-no-color", "-json"], TIMING.INFRA_INIT_TIMEOUT_MS);
    if (result.exitCode !== 0) this.fail("output", result);
    const parsed: unknown = JSON.parse(result.stdout || "{}");
    return isTerraformOutput(parsed) ? parsed : {};
  }

  /**
   * Destroy with a force-kill timeout. A killed destroy leaves a stale
   * state lock behind; it is removed and the destroy retried.
   */
  async destroy(dir: string, retries = TIMING.DESTROY_RETRIES): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        const result = await this.run(dir,
          ["destroy", "-no-color", "-input=false", "-auto-approve", `-var-file=${VAR_FILE}`],
          TIMING.DESTROY_TIMEOUT_MS);
        if (!isFailedRun(result)) return;
        throw new ConcreteProviderError(this.provider, "INFRA_DESTROY_FAILED",
          `terraform destroy failed: ${summarize(result)}`,
          { details: { dir, exitCode: result.exitCode } }
        );
      } catch (err) {
        if (!(err instanceof CommandTimeoutError) || attempt >= retries) {
          if (err instanceof CommandTimeoutError) {
            throw new ConcreteProviderError(this.provider, "TIMEOUT_ERROR",
              `terraform destroy killed after ${err.timeoutMs}ms`, { details: { dir } });
          }
          throw err;
        }
        console.warn(`[terraform] destroy in ${dir} killed after ${err.timeoutMs}ms, retrying`);
        rmSync(join(dir, ".terraform.tfstate.lock.info"), { force: true });
      }
    }
  }
}

function isTerraformOutput(value: unknown): value is TerraformOutput {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "object" && v !== null && "value" in v);
}

/** Last few meaningful lines of a command's output */
export function summarize(result: ExecResult): string {
  const lines = `${result.stdout}\n${result.stderr}`
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);
  const errorLines = lines.filter((l) => l.includes("Error"));
  return (errorLines.length > 0 ? errorLines : lines).slice(-3).join(" | ") || `exit ${result.exitCode}`;
}

/** Write the variables file into an infra directory */
export function writeVarFile(dir: string, vars: Record<string, TfValue>): void {
  writeFileSync(join(dir, VAR_FILE), renderTfvars(vars));
}

// =============================================================================
// Output Accessors
// =============================================================================

export function outputString(out: TerraformOutput, key: string): string | null {
  const v = out[key]?.value;
  return typeof v === "string" && v.length > 0 ? v : null;
}

export function outputStrings(out: TerraformOutput, key: string): string[] {
  const v = out[key]?.value;
  if (typeof v === "string") return v.length > 0 ? [v] : [];
  if (Array.isArray(v)) return v.filter((x): x is string => typeof x === "string" && x.length > 0);
  return [];
}
