// workflow/state-transitions.ts - Provisioning State Machine Rules
// Canonical source for provisioning state transitions.

import { ConflictError } from "@zathras/contracts";
import type { ProvisionState } from "@zathras/contracts";

// =============================================================================
// Transition Result Type
// =============================================================================

export type TransitionResult<T> =
  | { success: true; data: T }
  | { success: false; reason: "WRONG_STATE"; current: T };

export function transitionSuccess<T>(data: T): TransitionResult<T> {
  return { success: true, data };
}

export function transitionFailure<T>(current: T): TransitionResult<T> {
  return { success: false, reason: "WRONG_STATE", current };
}

// =============================================================================
// Transition Table
// =============================================================================

/**
 * Unprovisioned -> Planning -> Applying -> WaitingForReachability
 *   -> CpuVerification -> Provisioned, with Failed reachable from every
 * non-terminal state. CpuVerification is skipped when no CPU is requested.
 */
export const PROVISION_TRANSITIONS: Readonly<Record<ProvisionState, readonly ProvisionState[]>> = {
  Unprovisioned: ["Planning", "Failed"],
  Planning: ["Applying", "Failed"],
  Applying: ["WaitingForReachability", "Failed"],
  WaitingForReachability: ["CpuVerification", "Provisioned", "Failed"],
  CpuVerification: ["Provisioned", "Failed"],
  Provisioned: [],
  Failed: [],
};

export function canTransition(from: ProvisionState, to: ProvisionState): boolean {
  return PROVISION_TRANSITIONS[from].includes(to);
}

/** Tracks one provisioning attempt's state; reports every change */
export class ProvisionStateMachine {
  private _state: ProvisionState = "Unprovisioned";

  constructor(private readonly onChange: (state: ProvisionState, detail?: string) => void) {}

  get state(): ProvisionState {
    return this._state;
  }

  transition(to: ProvisionState, detail?: string): TransitionResult<ProvisionState> {
    if (!canTransition(this._state, to)) return transitionFailure(this._state);
    this._state = to;
    this.onChange(to, detail);
    return transitionSuccess(to);
  }

  /** Transition or throw; used where a wrong state is a programming error */
  advance(to: ProvisionState, detail?: string): void {
    const result = this.transition(to, detail);
    if (!result.success) {
      throw new ConflictError(`Invalid provisioning transition ${result.current} -> ${to}`, {
        details: { from: result.current, to },
      });
    }
  }
}
