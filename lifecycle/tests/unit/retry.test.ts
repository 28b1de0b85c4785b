// tests/unit/retry.test.ts - Provisioning retry decisions and loop

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { StageError } from "@zathras/contracts";
import {
  ConcreteProviderError,
  CpuMismatchError,
  ResourceGroupConflictError,
  SpotUnavailableError,
} from "../../control/src/provider/errors";
import { RunContext } from "../../control/src/workflow/context";
import {
  applyDecision,
  currentSpotPrice,
  decideRetry,
  initialAttemptState,
  provisionWithRetry,
  resourceGroupName,
} from "../../control/src/workflow/retry";
import { FakeExec, makeConfig, setupTest, testDeps, type TestEnv } from "../harness";
import { makeMockProvider } from "../mock-provider";

let env: TestEnv;
beforeEach(() => { env = setupTest(); });
afterEach(() => env.cleanup());

const plain = { resourceGroups: false };

// =============================================================================
// Decisions
// =============================================================================

describe("decideRetry", () => {
  test("spot failures walk the tiers, then fall back to on-demand once", () => {
    let state = initialAttemptState(["0.10", "0.20"], 3);
    expect(currentSpotPrice(state)).toBe("0.10");

    const spotErr = new SpotUnavailableError("aws", "0.10");
    const first = decideRetry(state, spotErr, plain);
    expect(first).toEqual({ action: "next_spot_tier", tierIndex: 1 });
    state = applyDecision(state, first);
    expect(currentSpotPrice(state)).toBe("0.20");
    expect(state.attempt).toBe(1);

    const second = decideRetry(state, spotErr, plain);
    expect(second).toEqual({ action: "fallback_on_demand" });
    state = applyDecision(state, second);
    expect(currentSpotPrice(state)).toBeNull();
    expect(state.spotExhausted).toBe(true);

    const third = decideRetry(state, spotErr, plain);
    expect(third).toEqual({ action: "fail", code: "SPOT_UNAVAILABLE", message: "Spot request failed at price 0.10" });
  });

  test("cpu mismatch retries until the attempt budget is spent", () => {
    const state = initialAttemptState([], 2);
    const err = new CpuMismatchError("aws", "8375C", "AMD EPYC 7R13");
    const decision = decideRetry(state, err, { resourceGroups: false, cpuRequested: "8375C" });
    expect(decision).toEqual({ action: "retry", reason: "cpu_mismatch", renameGroup: false });

    const next = applyDecision(state, decision);
    expect(next.attempt).toBe(2);
    expect(next.cpuRejected).toBe(true);
    expect(decideRetry(next, err, { resourceGroups: false, cpuRequested: "8375C" })).toEqual({
      action: "fail",
      code: "CPU_TYPE_UNAVAILABLE",
      message: 'could not obtain requested CPU type "8375C" after 2 attempts',
    });
  });

  test("cpu mismatch renames the group on resource-group providers", () => {
    const state = initialAttemptState([], 3);
    const decision = decideRetry(state, new CpuMismatchError("azure", "8370C", "other"), { resourceGroups: true });
    expect(decision).toEqual({ action: "retry", reason: "cpu_mismatch", renameGroup: true });
    expect(applyDecision(state, decision).resourceGroupSuffix).toBe(1);
  });

  test("resource group conflict bumps the suffix and the attempt", () => {
    const state = initialAttemptState([], 2);
    const err = new ResourceGroupConflictError("azure", "zathras-system1-rg");
    const decision = decideRetry(state, err, { resourceGroups: true });
    const next = applyDecision(state, decision);
    expect(next.attempt).toBe(2);
    expect(next.resourceGroupSuffix).toBe(1);
    expect(decideRetry(next, err, { resourceGroups: true })).toEqual({
      action: "fail",
      code: "RESOURCE_GROUP_CONFLICT",
      message: "Resource group zathras-system1-rg already exists (gave up after 2 attempts)",
    });
  });

  test("unreachable and unknown errors are fatal", () => {
    const state = initialAttemptState(["0.10"], 5);
    expect(decideRetry(state, new ConcreteProviderError("aws", "UNREACHABLE", "no ssh"), plain)).toEqual({
      action: "fail",
      code: "UNREACHABLE",
      message: "no ssh",
    });
    expect(decideRetry(state, new Error("boom"), plain)).toEqual({
      action: "fail",
      code: "PROVISION_FAILED",
      message: "boom",
    });
  });
});

describe("resourceGroupName", () => {
  test("suffix 0 keeps the base", () => {
    expect(resourceGroupName("zathras-system1-rg", 0)).toBe("zathras-system1-rg");
  });

  test("an existing numeric suffix is replaced", () => {
    expect(resourceGroupName("perf-rg-2", 3)).toBe("perf-rg-3");
    expect(resourceGroupName("perf-rg", 1)).toBe("perf-rg-1");
  });
});

// =============================================================================
// Loop
// =============================================================================

describe("provisionWithRetry", () => {
  test("every spot tier failing ends in exactly one on-demand attempt", async () => {
    const config = makeConfig(env.dir, {
      system_type: "aws",
      host_config: "m5.xlarge",
      tests: "streams",
      spot_range: "0.10,0.20,0.30",
    });
    const provider = makeMockProvider({
      apply: (plan) => {
        const price = plan.request.spotPrice;
        if (price !== null) throw new SpotUnavailableError("aws", price);
      },
    });
    const ctx = new RunContext(config, testDeps(new FakeExec()));

    const outcome = await provisionWithRetry(ctx, provider, initialAttemptState(config.options.spot_range, 5));

    const plans = provider.calls.filter((c) => c.op === "plan");
    expect(plans.map((c) => c.request?.spotPrice)).toEqual(["0.10", "0.20", "0.30", null]);
    expect(plans.map((c) => c.request?.attempt)).toEqual([1, 1, 1, 1]);
    expect(provider.ops().filter((op) => op === "destroy")).toHaveLength(3);
    expect(outcome.resource.spot).toBe(false);
    expect(outcome.state.spotExhausted).toBe(true);
    expect(ctx.resource).toBe(outcome.resource);
  });

  test("cpu mismatch destroys the instance before the next plan", async () => {
    const config = makeConfig(env.dir, {
      system_type: "aws",
      host_config: "m5.xlarge",
      tests: "streams",
      cpu_type_request: "8375C",
    });
    const exec = new FakeExec();
    let lscpuCalls = 0;
    exec.on("lscpu", () => {
      lscpuCalls++;
      return {
        stdout: lscpuCalls === 1
          ? "Model name:            AMD EPYC 7R13 Processor\n"
          : "Model name:            Intel(R) Xeon(R) Platinum 8375C CPU @ 2.90GHz\n",
      };
    });
    const provider = makeMockProvider();
    const ctx = new RunContext(config, testDeps(exec));

    const outcome = await provisionWithRetry(ctx, provider, initialAttemptState([], 3));

    expect(provider.ops()).toEqual([
      "plan", "apply", "resolveAddress", "destroy",
      "plan", "apply", "resolveAddress",
    ]);
    expect(provider.calls.filter((c) => c.op === "plan").map((c) => c.request?.attempt)).toEqual([1, 2]);
    expect(outcome.state.cpuRejected).toBe(true);
    expect(ctx.attempts).toBe(2);
    expect(readFileSync(join(ctx.workdir, "provision_state"), "utf8")).toBe("Provisioned\n");
  });

  test("a failed destroy of the mismatched instance stops before the next plan", async () => {
    const config = makeConfig(env.dir, {
      system_type: "aws",
      host_config: "m5.xlarge",
      tests: "streams",
      cpu_type_request: "8375C",
    });
    const exec = new FakeExec().on("lscpu", { stdout: "Model name: AMD EPYC 7R13\n" });
    let destroys = 0;
    const provider = makeMockProvider({
      destroy: () => {
        if (destroys++ === 0) throw new Error("terraform destroy failed: Error: DependencyViolation");
      },
    });
    const ctx = new RunContext(config, testDeps(exec));

    const err = await provisionWithRetry(ctx, provider, initialAttemptState([], 3)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StageError);
    if (!(err instanceof StageError)) return;
    expect(err.stage).toBe("provision");
    expect(err.code).toBe("DESTROY_FAILED");
    expect(err.message).toBe("destroy after failed attempt 1 failed: terraform destroy failed: Error: DependencyViolation");
    expect(provider.ops()).toEqual(["plan", "apply", "resolveAddress", "destroy"]);
    expect(ctx.plan?.request.attempt).toBe(1);
  });

  test("cpu never matching gives up with the attempt count", async () => {
    const config = makeConfig(env.dir, {
      system_type: "aws",
      host_config: "m5.xlarge",
      tests: "streams",
      cpu_type_request: "8375C",
      create_attempts: "2",
    });
    const exec = new FakeExec().on("lscpu", { stdout: "Model name: AMD EPYC 7R13\n" });
    const provider = makeMockProvider();
    const ctx = new RunContext(config, testDeps(exec));

    const err = await provisionWithRetry(ctx, provider, initialAttemptState([], 2)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StageError);
    if (!(err instanceof StageError)) return;
    expect(err.stage).toBe("provision");
    expect(err.code).toBe("CPU_TYPE_UNAVAILABLE");
    expect(err.message).toBe('could not obtain requested CPU type "8375C" after 2 attempts');
    expect(provider.ops().filter((op) => op === "destroy")).toHaveLength(2);
    expect(ctx.plan).toBeNull();
  });

  test("azure conflict retries under a renamed resource group", async () => {
    const config = makeConfig(env.dir, { system_type: "azure", host_config: "Standard_D4s_v5", tests: "streams" });
    const provider = makeMockProvider({
      name: "azure",
      apply: (plan, index) => {
        if (index === 0) throw new ResourceGroupConflictError("azure", plan.request.resourceGroup ?? "?");
      },
    });
    const ctx = new RunContext(config, testDeps(new FakeExec()));

    await provisionWithRetry(ctx, provider, initialAttemptState([], 3));

    const groups = provider.calls.filter((c) => c.op === "plan").map((c) => c.request?.resourceGroup);
    expect(groups).toEqual(["zathras-system1-rg", "zathras-system1-rg-1"]);
  });

  test("an unreachable host fails without another attempt", async () => {
    const config = makeConfig(env.dir, { system_type: "aws", host_config: "m5.xlarge", tests: "streams" });
    const exec = new FakeExec().on(/^ssh /, { exitCode: 255 });
    const provider = makeMockProvider();
    const ctx = new RunContext(config, testDeps(exec));

    const err = await provisionWithRetry(ctx, provider, initialAttemptState([], 5)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StageError);
    if (!(err instanceof StageError)) return;
    expect(err.code).toBe("UNREACHABLE");
    expect(err.message).toBe("10.0.0.1 did not accept SSH after 10 attempts");
    expect(provider.ops().filter((op) => op === "plan")).toHaveLength(1);
    expect(existsSync(join(ctx.workdir, "cloud_timings"))).toBe(true);
  });
});
