// index.ts - Lifecycle package entry

export { resolveRun, passLabel, buildPasses } from "./config/resolver";
export type { ResolveInput, ResolvedRun, RunConfiguration, TuningPass } from "./config/resolver";
export { parseHostDescriptor, totalDiskCount } from "./config/descriptor";
export type { HostDescriptor, DiskSpec, NetworkSpec, SysctlSpec } from "./config/descriptor";
export { OPTION_NAMES, OPTION_KINDS, isOptionName } from "./config/options";
export type { RunOptions, OptionName } from "./config/options";
export { loadTestCatalog, DEFAULT_TEST_DEFS } from "./config/test-defs";
export type { TestDescriptor, TestCatalog } from "./config/test-defs";

export { getProvider, registerProvider, clearAllProviders } from "./provider/registry";
export { ProviderOperationError } from "./provider/errors";
export type { ExecFunction, ExecResult, ExecOptions } from "./provider/exec";
export type { CloudProvider, ProvisionPlan, ProvisionRequest, ProvisionedResource } from "./provider/types";

export { RunContext, defaultDeps } from "./workflow/context";
export type { RunDeps, SourceFetcher } from "./workflow/context";
export { preflightSystems, runSystem, systemTypesOf } from "./workflow/pipeline";
export { runGroups } from "./workflow/scheduler";
export type { SystemRunner } from "./workflow/scheduler";

export { scanResultsTree } from "./orphan/scanner";
export type { OrphanRecord, ScanResult } from "./orphan/scanner";
export { safeDestroyBatch, safeDestroyOrphan } from "./orphan/safety";
export type { DestroyRequest, DestroyResult } from "./orphan/safety";
