// workflow/spot-recovery.ts - Mid-Run Spot Eviction Recovery
// When a spot instance is reclaimed during tests, the system is
// re-provisioned on demand and only the unfinished tests run again.

import type { TestDescriptor } from "../config/test-defs";
import { isConnectionFailure } from "../provider/errors";
import type { CloudProvider, ProvisionPlan, ProvisionedResource } from "../provider/types";
import type { AttemptState } from "./retry";

/** Drop spot for the rest of this system's life */
export function stripSpot(state: AttemptState): AttemptState {
  return { ...state, spotActive: false, spotExhausted: true };
}

/**
 * Attempt state for the on-demand restart after an eviction. The restart
 * gets its own attempt number but does not spend the create_attempts
 * budget: the eviction was not a provisioning failure.
 */
export function restartState(state: AttemptState): AttemptState {
  return stripSpot({ ...state, attempt: state.attempt + 1, maxAttempts: state.maxAttempts + 1 });
}

/**
 * Work list for a restart: the remaining tests minus every completed one,
 * in their original order. Unknown names in `completed` are ignored.
 */
export function removeCompletedTests(
  remaining: readonly TestDescriptor[],
  completed: readonly string[]
): TestDescriptor[] {
  const done = new Set(completed);
  return remaining.filter((t) => !done.has(t.name));
}

/**
 * An error during tests counts as an eviction when the connection dropped
 * on a spot instance, and the provider (when it can tell) confirms the
 * instance was reclaimed. A failing provider check is reported through
 * onCheckError and counts as no eviction, so the caller keeps its error.
 */
export async function isSpotEviction(
  error: unknown,
  provider: CloudProvider,
  plan: ProvisionPlan | null,
  resource: ProvisionedResource | null,
  onCheckError: (checkError: unknown) => void
): Promise<boolean> {
  if (!resource?.spot || !isConnectionFailure(error)) return false;
  if (!provider.checkInterrupted || !plan) return true;
  try {
    return await provider.checkInterrupted(plan, resource);
  } catch (checkError) {
    onCheckError(checkError);
    return false;
  }
}
