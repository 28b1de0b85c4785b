// workflow/provision.ts - Provisioning Driver
// One attempt: Planning -> Applying -> WaitingForReachability ->
// CpuVerification -> Provisioned. Any failure disposes of whatever the
// attempt created before the error propagates to the retry controller.

import { existsSync, renameSync } from "node:fs";
import { join } from "node:path";
import { StageError, TIMING, errorMessage } from "@zathras/contracts";
import { ConcreteProviderError, CpuMismatchError } from "../provider/errors";
import type { CloudProvider, ProvisionPlan, ProvisionRequest, ProvisionedResource } from "../provider/types";
import type { RunContext } from "./context";
import { ProvisionStateMachine } from "./state-transitions";

export interface ProvisionOutcome {
  plan: ProvisionPlan;
  resource: ProvisionedResource;
}

// =============================================================================
// Reachability
// =============================================================================

/**
 * Poll for a routable address, then for SSH, with a fixed count and a
 * fixed delay.
 */
export async function waitForReachability(
  ctx: RunContext,
  provider: CloudProvider,
  plan: ProvisionPlan
): Promise<ProvisionedResource> {
  const retries = TIMING.REACHABILITY_RETRIES;
  let resource: ProvisionedResource | null = null;
  for (let i = 0; i < retries; i++) {
    resource ??= await provider.resolveAddress(plan);
    if (resource && (await ctx.sshTo(resource).isReachable())) return resource;
    if (i < retries - 1) await ctx.deps.sleep(TIMING.REACHABILITY_DELAY_MS);
  }
  throw new ConcreteProviderError(provider.name, "UNREACHABLE",
    resource
      ? `${resource.hostname} did not accept SSH after ${retries} attempts`
      : `No routable address for ${plan.request.system} after ${retries} attempts`,
    { details: { system: plan.request.system, hostname: resource?.hostname } }
  );
}

// =============================================================================
// CPU Verification
// =============================================================================

/** Model name as reported by lscpu, e.g. "Intel(R) Xeon(R) Platinum 8375C CPU @ 2.90GHz" */
export function parseCpuModel(lscpuOutput: string): string {
  const line = lscpuOutput.split("\n").find((l) => l.includes("Model name:"));
  return line ? line.slice(line.indexOf(":") + 1).trim() : "";
}

export async function verifyCpu(
  ctx: RunContext,
  provider: CloudProvider,
  resource: ProvisionedResource,
  requested: string
): Promise<void> {
  const out = await ctx.sshTo(resource).check(`lscpu | grep "Model name:"`);
  const actual = parseCpuModel(out);
  if (!actual.includes(requested)) {
    throw new CpuMismatchError(provider.name, requested, actual || "unknown");
  }
  ctx.log("provision", `CPU "${actual}" matches "${requested}"`);
}

// =============================================================================
// Disposal
// =============================================================================

/**
 * Destroy a failed attempt's resources and move its infra directory aside
 * as tf_delete_<attempt>. A failed destroy throws DESTROY_FAILED and leaves
 * ctx.plan on the undestroyed plan, so no further attempt is made and
 * teardown tries again.
 */
export async function disposeFailedAttempt(
  ctx: RunContext,
  provider: CloudProvider,
  plan: ProvisionPlan
): Promise<void> {
  if (!provider.capabilities.infrastructure) {
    ctx.plan = null;
    return;
  }
  try {
    await provider.destroy(plan);
    ctx.markers.progress(`attempt ${plan.request.attempt} resources destroyed`);
    ctx.plan = null;
  } catch (err) {
    ctx.warn("provision", `destroy after failed attempt ${plan.request.attempt} failed: ${errorMessage(err)}`);
    ctx.markers.progress(`attempt ${plan.request.attempt} destroy FAILED: ${errorMessage(err)}`);
    ctx.plan = plan;
    throw new StageError("provision",
      `destroy after failed attempt ${plan.request.attempt} failed: ${errorMessage(err)}`,
      { code: "DESTROY_FAILED", details: { attempt: plan.request.attempt, infraDir: plan.infraDir }, cause: err }
    );
  }
  if (plan.infraDir && existsSync(plan.infraDir)) {
    const aside = join(ctx.workdir, `tf_delete_${plan.request.attempt}`);
    renameSync(plan.infraDir, aside);
  }
}

// =============================================================================
// Driver
// =============================================================================

export async function provisionOnce(
  ctx: RunContext,
  provider: CloudProvider,
  request: ProvisionRequest
): Promise<ProvisionOutcome> {
  const sm = new ProvisionStateMachine((state, detail) => ctx.markers.provisionState(state, detail));
  const started = ctx.deps.now();
  const spot = request.spotPrice !== null ? ` spot=${request.spotPrice}` : "";
  let plan: ProvisionPlan | null = null;

  try {
    sm.advance("Planning", `attempt=${request.attempt}${spot}`);
    plan = await provider.plan(request);
    ctx.plan = plan;

    sm.advance("Applying");
    await provider.apply(plan);
    ctx.markers.cloudTiming("instance_start", ctx.elapsedSeconds(started));

    sm.advance("WaitingForReachability");
    let resource = await waitForReachability(ctx, provider, plan);
    if (provider.finalize) resource = await provider.finalize(plan, resource);
    ctx.markers.cloudTiming("instance_ready", ctx.elapsedSeconds(started));

    const cpu = ctx.config.options.cpu_type_request;
    if (cpu) {
      sm.advance("CpuVerification", `want "${cpu}"`);
      await verifyCpu(ctx, provider, resource, cpu);
    }

    sm.advance("Provisioned", resource.hostname);
    ctx.resource = resource;
    return { plan, resource };
  } catch (err) {
    sm.transition("Failed", errorMessage(err));
    if (plan) await disposeFailedAttempt(ctx, provider, plan);
    throw err;
  }
}
