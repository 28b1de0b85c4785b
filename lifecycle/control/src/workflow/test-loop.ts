// workflow/test-loop.ts - Test Execution Loop
// Passes over the same system; every remaining test runs once per pass.

import { copyFileSync, existsSync, mkdirSync, rmSync } from "node:fs";
import { basename, join } from "node:path";
import { StageError, TIMING, ZathrasError, errorMessage } from "@zathras/contracts";
import type { RunResult } from "@zathras/contracts";
import type { TuningPass } from "../config/resolver";
import { renderTestSpecific, sourceUrl, type TestDescriptor } from "../config/test-defs";
import { ProviderOperationError, isConnectionFailure } from "../provider/errors";
import { shellQuote } from "../provider/ssh";
import type { RunContext } from "./context";
import { applyTuningPass } from "./install";
import { readArchiveStatus } from "./results";

// =============================================================================
// Command Construction
// =============================================================================

export function placeholderValues(ctx: RunContext): Record<string, string> {
  const local = ctx.config.localHost;
  return {
    storage: ctx.storageDevices.join(","),
    server_ips: local ? local.serverIps.join(",") : "",
    client_ips: local ? local.clientIps.join(",") : "",
    run_label: ctx.config.options.run_label,
    test_user: ctx.config.sshUser,
  };
}

/** Wrapper arguments after the script path */
export function buildTestArgs(ctx: RunContext, test: TestDescriptor, pass: TuningPass): string {
  const { options, descriptor, system, systemType, sshUser } = ctx.config;
  const parts = [
    `--run_user ${sshUser}`,
    `--home_parent ${options.user_parent_home_dir}`,
    `--iterations ${options.test_iterations}`,
    `--tuned_setting ${pass.label}`,
    `--host_config "${descriptor.raw}"`,
    `--sysname "${system}"`,
    `--sys_type ${systemType}`,
  ];
  if (test.pbenchRequired) parts.push("--use_pbench");

  const specific = renderTestSpecific(test.testSpecific, placeholderValues(ctx));
  if (specific.missing.length > 0) {
    ctx.warn("tests", `${test.name}: no value for ${specific.missing.join(", ")}`);
  }
  if (specific.text) parts.push(specific.text);
  return parts.join(" ");
}

export function unpackCommand(archive: string, dest: string): string[] {
  return archive.endsWith(".zip")
    ? ["unzip", "-o", "-q", archive, "-d", dest]
    : ["tar", "-xf", archive, "-C", dest];
}

export function remoteArchivePath(test: TestDescriptor): string {
  return `/tmp/results_${test.name}.zip`;
}

// =============================================================================
// One Test
// =============================================================================

async function fetchTestSource(ctx: RunContext, test: TestDescriptor): Promise<string> {
  const dir = join(ctx.workdir, "tests_to_use");
  mkdirSync(dir, { recursive: true });
  const dest = join(dir, `${test.name}_${test.repoFile}`);
  if (!existsSync(dest)) {
    const url = sourceUrl(test);
    ctx.log("tests", `fetching ${url}`);
    try {
      await ctx.deps.fetchSource(url, dest);
    } catch (err) {
      rmSync(dest, { force: true });
      throw new StageError("tests", `Cannot fetch ${url}: ${errorMessage(err)}`, { code: "FETCH_FAILED", cause: err });
    }
  }
  return dest;
}

async function rebootIf(ctx: RunContext, test: TestDescriptor, when: "before" | "after"): Promise<void> {
  if (test.runFrom !== "remote") return;
  if (test.rebootSystem === when || test.rebootSystem === "both") {
    ctx.log("tests", `rebooting ${when} ${test.name}`);
    await ctx.ssh().reboot();
  }
}

/** Run on the system; returns the wrapper's exit code */
async function runRemote(ctx: RunContext, test: TestDescriptor, pass: TuningPass, source: string): Promise<number> {
  const ssh = ctx.ssh();
  const workloads = `${ctx.remoteHome}/workloads`;
  const remoteSource = `${workloads}/${basename(source)}`;
  try {
    await ssh.check(`mkdir -p ${shellQuote(workloads)}`);
    await ssh.copyTo(source, remoteSource);
    await ssh.check(unpackCommand(remoteSource, workloads).map(shellQuote).join(" "));
  } catch (err) {
    if (isConnectionFailure(err) || !(err instanceof ProviderOperationError)) throw err;
    throw new StageError("tests", `Cannot unpack ${remoteSource} on ${ssh.target.host}: ${err.message}`, {
      code: "UNPACK_FAILED",
      cause: err,
    });
  }

  await rebootIf(ctx, test, "before");
  const command = `${workloads}/${test.execDir}/${test.script} ${buildTestArgs(ctx, test, pass)}`;
  ctx.markers.progress(`run ${command}`);
  const result = await ssh.run(command, { timeout: TIMING.TEST_EXEC_TIMEOUT_MS });
  return result.exitCode;
}

/** Run on the controller (tests that drive the system over the network) */
async function runLocal(ctx: RunContext, test: TestDescriptor, pass: TuningPass, source: string): Promise<number> {
  const workloads = join(ctx.workdir, "workloads");
  mkdirSync(workloads, { recursive: true });
  const unpacked = await ctx.deps.exec(unpackCommand(source, workloads));
  if (unpacked.exitCode !== 0) {
    throw new StageError("tests", `Cannot unpack ${source}: ${unpacked.stderr.trim()}`, { code: "UNPACK_FAILED" });
  }
  const command = `${join(workloads, test.execDir, test.script)} ${buildTestArgs(ctx, test, pass)}`;
  ctx.markers.progress(`run ${command}`);
  const result = await ctx.deps.exec(["bash", "-c", command], { timeout: TIMING.TEST_EXEC_TIMEOUT_MS });
  return result.exitCode;
}

async function fetchArchive(ctx: RunContext, test: TestDescriptor, dest: string): Promise<void> {
  const remote = remoteArchivePath(test);
  if (test.runFrom === "local") {
    if (existsSync(remote)) copyFileSync(remote, dest);
    return;
  }
  try {
    await ctx.ssh().copyFrom(remote, dest);
  } catch (err) {
    if (isConnectionFailure(err) || !(err instanceof ProviderOperationError)) throw err;
    ctx.warn("tests", `${test.name}: no ${remote} to retrieve (${errorMessage(err)})`);
  }
}

export async function runOneTest(ctx: RunContext, test: TestDescriptor, pass: TuningPass): Promise<RunResult> {
  const source = await fetchTestSource(ctx, test);
  const passDir = join(ctx.workdir, pass.label);
  mkdirSync(passDir, { recursive: true });

  const started = ctx.deps.now();
  const exitCode = test.runFrom === "remote"
    ? await runRemote(ctx, test, pass, source)
    : await runLocal(ctx, test, pass, source);
  const durationSeconds = ctx.elapsedSeconds(started);
  ctx.markers.testTime(test.name, durationSeconds);

  let archivePath: string | null = null;
  if (test.archiveResults || test.pbenchLocalResults) {
    const dest = join(passDir, basename(remoteArchivePath(test)));
    await fetchArchive(ctx, test, dest);
    archivePath = existsSync(dest) ? dest : null;
  }
  await rebootIf(ctx, test, "after");

  if (test.archiveResults) {
    const parsed = archivePath
      ? await readArchiveStatus(archivePath, join(passDir, test.name))
      : { status: "FAIL" as const, reportStatus: "MISSING_ARCHIVE" };
    return { test: test.name, pass: pass.label, exitCode, durationSeconds, archivePath, ...parsed };
  }
  return {
    test: test.name,
    pass: pass.label,
    status: exitCode === 0 ? "PASS" : "FAIL",
    reportStatus: null,
    exitCode,
    durationSeconds,
    archivePath,
  };
}

// =============================================================================
// Passes
// =============================================================================

export function runKey(pass: TuningPass, test: TestDescriptor): string {
  return `${pass.label}/${test.name}`;
}

/** A run that never produced an exit code; the error code becomes its report status */
export function failedRun(test: TestDescriptor, pass: TuningPass, error: unknown): RunResult {
  return {
    test: test.name,
    pass: pass.label,
    status: "FAIL",
    reportStatus: error instanceof ZathrasError || error instanceof ProviderOperationError ? error.code : "ERROR",
    exitCode: -1,
    durationSeconds: 0,
    archivePath: null,
  };
}

/**
 * Every pass, then every remaining test in declaration order. Runs that
 * already completed (before a spot restart) are skipped. A test that
 * cannot run is recorded as a FAIL and the loop moves on; a lost
 * connection ends the loop so the caller can check for eviction.
 */
export async function runTestPasses(ctx: RunContext): Promise<void> {
  const host = ctx.ssh().target.host;
  ctx.addToGroup("test", host);
  ctx.testsStarted = true;

  const passes = ctx.config.passes;
  for (const [index, pass] of passes.entries()) {
    const termSystem = index === passes.length - 1;
    ctx.markers.progress(`pass ${pass.label} term_system=${termSystem}`);
    await applyTuningPass(ctx, pass);

    for (const test of ctx.remainingTests) {
      const key = runKey(pass, test);
      if (ctx.completedRuns.has(key)) continue;

      let result: RunResult;
      try {
        result = await runOneTest(ctx, test, pass);
      } catch (err) {
        if (isConnectionFailure(err)) throw err;
        ctx.warn("tests", `${test.name} [${pass.label}] could not run: ${errorMessage(err)}`);
        result = failedRun(test, pass, err);
      }
      ctx.results.push(result);
      ctx.completedRuns.add(key);
      if (termSystem) ctx.completedTests.push(test.name);
      ctx.log("tests", `${test.name} [${pass.label}] ${result.status}${result.reportStatus ? ` (${result.reportStatus})` : ""}`);

      if (result.status === "FAIL" && ctx.config.options.abort_on_test_failure) {
        throw new StageError("tests", `${test.name} failed and abort_on_test_failure is set`, {
          code: "TEST_FAILED",
          details: { test: test.name, pass: pass.label },
        });
      }
    }
  }
}
