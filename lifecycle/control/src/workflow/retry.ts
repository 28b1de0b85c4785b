// workflow/retry.ts - Provisioning Retry Controller
// Pure decision over (attempt state, error) plus the loop that drives
// provisionOnce until it succeeds or the decision is to give up.

import { StageError, errorMessage } from "@zathras/contracts";
import { ProviderOperationError, type ProviderOperationErrorCode } from "../provider/errors";
import { defaultResourceGroup } from "../provider/compute/azure";
import type { CloudProvider, ProvisionRequest } from "../provider/types";
import type { RunContext } from "./context";
import { provisionOnce, type ProvisionOutcome } from "./provision";

// =============================================================================
// Attempt State
// =============================================================================

export interface AttemptState {
  /** 1-based; never decreases */
  attempt: number;
  maxAttempts: number;
  /** Spot prices to try in order */
  spotTiers: readonly string[];
  spotTierIndex: number;
  /** Current attempt requests spot capacity */
  spotActive: boolean;
  /** Spot was abandoned for this system; never requested again */
  spotExhausted: boolean;
  /** 0 keeps the base resource group name */
  resourceGroupSuffix: number;
  /** At least one instance was rejected for its CPU model */
  cpuRejected: boolean;
}

export function initialAttemptState(spotTiers: readonly string[], maxAttempts: number): AttemptState {
  return {
    attempt: 1,
    maxAttempts,
    spotTiers,
    spotTierIndex: 0,
    spotActive: spotTiers.length > 0,
    spotExhausted: false,
    resourceGroupSuffix: 0,
    cpuRejected: false,
  };
}

export function currentSpotPrice(state: AttemptState): string | null {
  if (!state.spotActive || state.spotExhausted) return null;
  return state.spotTiers[state.spotTierIndex] ?? null;
}

/** "<base>" for suffix 0, else "<base without -N>-<suffix>" */
export function resourceGroupName(base: string, suffix: number): string {
  if (suffix === 0) return base;
  return `${base.replace(/-\d+$/, "")}-${suffix}`;
}

// =============================================================================
// Decision Table
// =============================================================================

export type RetryStrategy = "next_spot_tier" | "new_attempt" | "rename_group" | "none";

export const ERROR_RETRY_MAPPING: Partial<Record<ProviderOperationErrorCode, RetryStrategy>> = {
  // Tier advance; does not consume a create attempt
  SPOT_UNAVAILABLE: "next_spot_tier",
  // Instance is destroyed before the next attempt
  CPU_MISMATCH: "new_attempt",
  RESOURCE_GROUP_CONFLICT: "rename_group",
  // Everything else (UNREACHABLE included) aborts the system
};

export type RetryDecision =
  | { action: "next_spot_tier"; tierIndex: number }
  | { action: "fallback_on_demand" }
  | { action: "retry"; reason: "cpu_mismatch" | "resource_group_conflict"; renameGroup: boolean }
  | { action: "fail"; code: string; message: string };

export interface RetryContext {
  /** Provider names resources by group; every retry gets a fresh one */
  resourceGroups: boolean;
  cpuRequested?: string;
}

export function decideRetry(state: AttemptState, error: unknown, ctx: RetryContext): RetryDecision {
  if (!(error instanceof ProviderOperationError)) {
    const code = error instanceof StageError ? error.code : "PROVISION_FAILED";
    return { action: "fail", code, message: errorMessage(error) };
  }

  const strategy = ERROR_RETRY_MAPPING[error.code] ?? "none";
  switch (strategy) {
    case "next_spot_tier":
      if (!state.spotActive || state.spotExhausted) {
        return { action: "fail", code: error.code, message: error.message };
      }
      if (state.spotTierIndex + 1 < state.spotTiers.length) {
        return { action: "next_spot_tier", tierIndex: state.spotTierIndex + 1 };
      }
      return { action: "fallback_on_demand" };

    case "new_attempt":
      if (state.attempt >= state.maxAttempts) {
        return {
          action: "fail",
          code: "CPU_TYPE_UNAVAILABLE",
          message: `could not obtain requested CPU type "${ctx.cpuRequested ?? "?"}" after ${state.attempt} attempts`,
        };
      }
      return { action: "retry", reason: "cpu_mismatch", renameGroup: ctx.resourceGroups };

    case "rename_group":
      if (state.attempt >= state.maxAttempts) {
        return {
          action: "fail",
          code: error.code,
          message: `${error.message} (gave up after ${state.attempt} attempts)`,
        };
      }
      return { action: "retry", reason: "resource_group_conflict", renameGroup: true };

    case "none":
      return { action: "fail", code: error.code, message: error.message };
  }
}

export function applyDecision(state: AttemptState, decision: RetryDecision): AttemptState {
  switch (decision.action) {
    case "next_spot_tier":
      return { ...state, spotTierIndex: decision.tierIndex };
    case "fallback_on_demand":
      return { ...state, spotActive: false, spotExhausted: true };
    case "retry":
      return {
        ...state,
        attempt: state.attempt + 1,
        cpuRejected: state.cpuRejected || decision.reason === "cpu_mismatch",
        resourceGroupSuffix: decision.renameGroup ? state.resourceGroupSuffix + 1 : state.resourceGroupSuffix,
      };
    case "fail":
      return state;
  }
}

// =============================================================================
// Request Construction
// =============================================================================

export function buildRequest(ctx: RunContext, state: AttemptState): ProvisionRequest {
  const { options, descriptor, system, systemType } = ctx.config;
  const baseGroup = options.cloud_resource_group ?? defaultResourceGroup(options.run_label, system);
  return {
    system,
    runLabel: options.run_label,
    descriptor,
    osVendor: options.os_vendor,
    osImage: options.cloud_os_id ?? null,
    region: descriptor.region ?? null,
    zone: descriptor.zone ?? null,
    sshKeyFile: options.ssh_key_file ?? null,
    sshUser: ctx.config.sshUser,
    spotPrice: currentSpotPrice(state),
    resourceGroup: systemType === "azure" ? resourceGroupName(baseGroup, state.resourceGroupSuffix) : null,
    tags: { ...options.tags },
    workdir: ctx.workdir,
    attempt: state.attempt,
  };
}

// =============================================================================
// Loop
// =============================================================================

export interface RetryOutcome extends ProvisionOutcome {
  state: AttemptState;
}

/**
 * Provision until a system is up. Throws StageError("provision") carrying
 * the last cause when the decision is to give up.
 */
export async function provisionWithRetry(
  ctx: RunContext,
  provider: CloudProvider,
  initial: AttemptState
): Promise<RetryOutcome> {
  let state = initial;
  const retryCtx: RetryContext = {
    resourceGroups: provider.capabilities.resourceGroups,
    cpuRequested: ctx.config.options.cpu_type_request,
  };

  for (;;) {
    ctx.attempts = state.attempt;
    try {
      const outcome = await provisionOnce(ctx, provider, buildRequest(ctx, state));
      return { ...outcome, state };
    } catch (err) {
      const decision = decideRetry(state, err, retryCtx);
      switch (decision.action) {
        case "fail":
          throw new StageError("provision", decision.message, {
            code: decision.code,
            category: err instanceof ProviderOperationError ? err.category : "internal",
            details: { attempts: state.attempt },
            cause: err,
          });
        case "next_spot_tier":
          ctx.log("retry", `spot price ${currentSpotPrice(state)} unavailable, trying ${state.spotTiers[decision.tierIndex]}`);
          break;
        case "fallback_on_demand":
          ctx.log("retry", "spot tiers exhausted, falling back to on-demand");
          break;
        case "retry":
          ctx.log("retry", `attempt ${state.attempt}/${state.maxAttempts} failed (${decision.reason}), retrying`);
          break;
      }
      state = applyDecision(state, decision);
    }
  }
}
