// types.ts - Core Types and Primitives

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Milliseconds since Unix epoch */
export type TimestampMs = number;

/** Duration in milliseconds */
export type DurationMs = number;

/** Label of a system under test ("system1", "system2", ...) */
export type SystemLabel = string;

export type SystemType = 'aws' | 'azure' | 'gcp' | 'ibm' | 'local';

export const SYSTEM_TYPES: readonly SystemType[] = ['aws', 'azure', 'gcp', 'ibm', 'local'];

export type CloudSystemType = Exclude<SystemType, 'local'>;

export type OsVendor = 'rhel' | 'ubuntu' | 'amazon';

export const OS_VENDORS: readonly OsVendor[] = ['rhel', 'ubuntu', 'amazon'];

export function isSystemType(value: string): value is SystemType {
  return SYSTEM_TYPES.some((t) => t === value);
}

export function isOsVendor(value: string): value is OsVendor {
  return OS_VENDORS.some((v) => v === value);
}

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export type ErrorCategory =
  | 'validation'
  | 'auth'
  | 'not_found'
  | 'conflict'
  | 'rate_limit'
  | 'capacity'
  | 'provider'
  | 'timeout'
  | 'internal';

// =============================================================================
// PIPELINE STAGES
// =============================================================================

export type StageName = 'config' | 'provision' | 'install' | 'tests' | 'teardown';

/** Provisioning driver states, in order of progress */
export type ProvisionState =
  | 'Unprovisioned'
  | 'Planning'
  | 'Applying'
  | 'WaitingForReachability'
  | 'CpuVerification'
  | 'Provisioned'
  | 'Failed';

export type RebootMode = 'before' | 'after' | 'both' | 'no';

export type StepStatus = 'success' | 'failed' | 'ignore';

// =============================================================================
// RESULTS
// =============================================================================

export type TestStatus = 'PASS' | 'FAIL';

/** Outcome of one test execution on one tuning pass */
export interface RunResult {
  test: string;
  /** Tuning variant label, e.g. "tuned_none_sys_file_none" */
  pass: string;
  status: TestStatus;
  /** Raw content of test_results_report, or null when not archived */
  reportStatus: string | null;
  exitCode: number;
  durationSeconds: number;
  archivePath: string | null;
}

export type SystemRunStatus = 'succeeded' | 'failed';

/** Final report of one system's pipeline */
export interface SystemRunReport {
  system: SystemLabel;
  status: SystemRunStatus;
  /** Stage that failed, when status is failed */
  failedStage?: StageName;
  error?: { code: string; message: string };
  attempts: number;
  results: RunResult[];
  bundlePath: string | null;
}

export function isTerminalProvisionState(state: ProvisionState): boolean {
  return state === 'Provisioned' || state === 'Failed';
}
