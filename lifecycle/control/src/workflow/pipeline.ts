// workflow/pipeline.ts - Per-System Pipeline
// provision -> install -> tests -> teardown. Teardown always runs; the
// outcome is returned as a report, never thrown. Credentials are checked
// once per system type by preflightSystems, before any system starts.

import { StageError, errorMessage, toErrorSummary } from "@zathras/contracts";
import type { StageName, SystemRunReport, SystemType } from "@zathras/contracts";
import type { ResolvedRun, RunConfiguration } from "../config/resolver";
import { getProvider } from "../provider/registry";
import type { CloudProvider } from "../provider/types";
import { RunContext, defaultDeps, type RunDeps } from "./context";
import { runInstall } from "./install";
import { disposeFailedAttempt } from "./provision";
import { initialAttemptState, provisionWithRetry } from "./retry";
import { isSpotEviction, removeCompletedTests, restartState } from "./spot-recovery";
import { teardown } from "./teardown";
import { runTestPasses } from "./test-loop";
import { recordUsage } from "./usage";

async function runStages(ctx: RunContext, setStage: (stage: StageName) => void): Promise<void> {
  const { options, systemType } = ctx.config;
  const provider = await ctx.deps.getProvider(systemType);
  ctx.provider = provider;

  let state = initialAttemptState(options.spot_range, options.create_attempts);

  for (;;) {
    setStage("provision");
    const outcome = await provisionWithRetry(ctx, provider, state);
    state = outcome.state;

    try {
      setStage("install");
      await runInstall(ctx);
      if (!options.execute_tests) {
        ctx.log("pipeline", "execute_tests is off; skipping tests");
        return;
      }
      setStage("tests");
      await runTestPasses(ctx);
      return;
    } catch (err) {
      if (!options.spot_recover) throw err;
      const evicted = await isSpotEviction(err, provider, ctx.plan, ctx.resource, (checkErr) =>
        ctx.warn("spot", `interruption check failed: ${errorMessage(checkErr)}`)
      );
      if (!evicted) throw err;

      ctx.warn("spot", `instance reclaimed during ${ctx.testsStarted ? "tests" : "install"}; re-provisioning on demand`);
      ctx.markers.progress("spot eviction, restarting on demand");
      if (ctx.plan) await disposeFailedAttempt(ctx, provider, ctx.plan);
      ctx.resource = null;
      ctx.remainingTests = removeCompletedTests(ctx.remainingTests, ctx.completedTests);
      state = restartState(state);
    }
  }
}

/** Every distinct system type in the run, in first-seen order */
export function systemTypesOf(resolved: ResolvedRun): SystemType[] {
  return [...new Set(resolved.groups.flat().map((c) => c.systemType))];
}

/**
 * Credential checks for every system type in the run. Throws the first
 * provider's error; nothing has been provisioned at that point.
 */
export async function preflightSystems(
  resolved: ResolvedRun,
  lookup: (type: SystemType) => Promise<CloudProvider> = getProvider
): Promise<void> {
  for (const type of systemTypesOf(resolved)) {
    const provider = await lookup(type);
    await provider.preflight();
  }
}

export async function runSystem(config: RunConfiguration, deps: RunDeps = defaultDeps()): Promise<SystemRunReport> {
  const ctx = new RunContext(config, deps);
  let stage: StageName = "provision";
  let failure: { error: unknown } | null = null;

  ctx.log("pipeline", `starting (${config.systemType}, ${config.descriptor.instanceType})`);
  try {
    await runStages(ctx, (s) => {
      stage = s;
    });
  } catch (error) {
    failure = { error };
    ctx.warn("pipeline", `${stage} failed: ${errorMessage(error)}`);
    ctx.markers.progress(`FAILED in ${stage}: ${errorMessage(error)}`);
  }

  const { bundlePath } = await teardown(ctx);
  try {
    await recordUsage(ctx);
  } catch (err) {
    ctx.warn("usage", `cannot write usage report: ${errorMessage(err)}`);
  }

  const report: SystemRunReport = {
    system: config.system,
    status: failure ? "failed" : "succeeded",
    attempts: ctx.attempts,
    results: ctx.results,
    bundlePath,
  };
  if (failure) {
    report.failedStage = failure.error instanceof StageError ? failure.error.stage : stage;
    report.error = toErrorSummary(failure.error);
  }
  ctx.log("pipeline", `${report.status}${report.failedStage ? ` (${report.failedStage})` : ""}`);
  return report;
}
