// config/resolver.ts - Config Resolution
// CLI flags, scenario-vars and the scenario file become one frozen
// RunConfiguration per system, grouped at SYS_BARRIER fences. Anything
// wrong here aborts the whole run before a single cloud call.

import { resolve } from "node:path";
import { ConfigurationError } from "@zathras/contracts";
import type { SystemType } from "@zathras/contracts";
import { DEFAULT_DISK_TYPES, PROVIDER_CAPABILITIES } from "../provider/types";
import { getCloudDefaults } from "../provider/config";
import { parseHostDescriptor, type HostDescriptor } from "./descriptor";
import { loadLocalHostConfig, type LocalHostConfig } from "./local-host";
import {
  coerceLayer,
  finalizeOptions,
  type OptionLayer,
  type RunOptions,
} from "./options";
import { loadScenario, loadScenarioVars, type ScenarioSystem } from "./scenario";
import { loadTestCatalog, type TestCatalog, type TestDescriptor } from "./test-defs";

// =============================================================================
// Types
// =============================================================================

/** One tuned/sysctl variant; tests run once per pass on the same system */
export interface TuningPass {
  label: string;
  sysctl: string | null;
  tuned: string | null;
}

export interface RunConfiguration {
  readonly system: string;
  readonly systemType: SystemType;
  readonly options: RunOptions;
  readonly descriptor: HostDescriptor;
  readonly tests: readonly TestDescriptor[];
  readonly localHost: LocalHostConfig | null;
  readonly sshUser: string;
  readonly passes: readonly TuningPass[];
  /** Absolute results root */
  readonly resultsDir: string;
  /** Absolute local_config_dir (host configs, sysctl profiles) */
  readonly configDir: string;
}

export interface ResolvedRun {
  /** Systems between barriers; groups run in order */
  groups: RunConfiguration[][];
  maxSystems: number;
}

export interface ResolveInput {
  /** Raw CLI option values keyed by option name */
  cli: Record<string, unknown>;
  scenarioFile?: string;
  scenarioVarsFile?: string;
  /** Base for relative paths (default process.cwd()) */
  cwd?: string;
  /** Preloaded catalog (tests) */
  catalog?: TestCatalog;
}

// =============================================================================
// Helpers
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

function unique(items: string[]): string[] {
  return [...new Set(items)];
}

export function passLabel(tuned: string | null, sysctl: string | null): string {
  return `tuned_${tuned ?? "none"}_sys_file_${sysctl ?? "none"}`;
}

/** Sysctl profiles x tuned profiles; a single "none" pass when neither is set */
export function buildPasses(options: RunOptions, descriptor: HostDescriptor): TuningPass[] {
  const sysctl = unique([...descriptor.sysctlProfiles, ...options.sysctl_settings]);
  const tuned = options.os_vendor === "rhel" ? unique(options.tuned_settings) : [];
  const passes: TuningPass[] = [];
  for (const s of sysctl.length > 0 ? sysctl : [null]) {
    for (const t of tuned.length > 0 ? tuned : [null]) {
      passes.push({ label: passLabel(t, s), sysctl: s, tuned: t });
    }
  }
  return passes;
}

function checkTests(label: string, options: RunOptions, catalog: TestCatalog): TestDescriptor[] {
  if (options.execute_tests && options.tests.length === 0) {
    throw new ConfigurationError(`${label}: no tests given`, { code: "MISSING_REQUIRED_OPTION" });
  }
  return options.tests.map((name) => {
    const test = catalog.get(name);
    if (!test) {
      throw new ConfigurationError(`${label}: unknown test ${name}`, {
        code: "UNKNOWN_TEST",
        details: { test: name, known: [...catalog.keys()] },
      });
    }
    if (!test.osSupported.includes(options.os_vendor)) {
      throw new ConfigurationError(`${label}: test ${name} does not support ${options.os_vendor}`);
    }
    return test;
  });
}

function checkRequirements(
  label: string,
  tests: TestDescriptor[],
  descriptor: HostDescriptor,
  localHost: LocalHostConfig | null
): void {
  for (const test of tests) {
    const hasStorage = localHost ? localHost.storage.length > 0 : descriptor.disks.length > 0;
    if (test.storageRequired && !hasStorage) {
      throw new ConfigurationError(
        `${label}: test ${test.name} needs storage but ${localHost ? localHost.path + " lists none" : "the descriptor has no Disks group"}`
      );
    }
    if (test.networkRequired && localHost && (localHost.serverIps.length === 0 || localHost.clientIps.length === 0)) {
      throw new ConfigurationError(`${label}: test ${test.name} needs server_ips and client_ips in ${localHost.path}`);
    }
  }
}

// =============================================================================
// Resolution
// =============================================================================

function resolveSystem(
  system: ScenarioSystem,
  layers: { global: OptionLayer; vars: OptionLayer; cli: OptionLayer },
  catalog: () => TestCatalog,
  cwd: string,
  scenarioPath: string
): RunConfiguration {
  const label = system.label;
  const own = coerceLayer(system.options, `${scenarioPath} systems.${label}`);
  const options = finalizeOptions([layers.global, own, layers.vars, layers.cli], label);
  const systemType = options.system_type;

  const descriptor = parseHostDescriptor(options.host_config, {
    defaultDiskType: DEFAULT_DISK_TYPES[systemType],
  });
  if (descriptor.region === undefined && options.cloud_region) descriptor.region = options.cloud_region;
  if (descriptor.zone === undefined && options.cloud_zone) descriptor.zone = options.cloud_zone;

  if (options.spot_range.length > 0 && !PROVIDER_CAPABILITIES[systemType].spot) {
    throw new ConfigurationError(`${label}: ${systemType} does not support spot instances`);
  }

  const configDir = resolve(cwd, options.local_config_dir);
  let localHost: LocalHostConfig | null = null;
  if (systemType === "local") {
    if (descriptor.disks.length > 0 || descriptor.networks) {
      console.warn(`[config] ${label}: Disks/Networks groups are ignored for local systems`);
    }
    localHost = loadLocalHostConfig(configDir, descriptor.instanceType);
  }

  const tests = checkTests(label, options, catalog());
  checkRequirements(label, tests, descriptor, localHost);

  const sshUser = options.test_user
    ?? (systemType === "local" ? "root" : getCloudDefaults(systemType).ssh_user);

  return deepFreeze({
    system: label,
    systemType,
    options,
    descriptor,
    tests,
    localHost,
    sshUser,
    passes: buildPasses(options, descriptor),
    resultsDir: resolve(cwd, options.results_dir),
    configDir,
  });
}

/**
 * Resolve every system. Precedence per option:
 * scenario global < scenario system entry < scenario-vars < CLI.
 */
export function resolveRun(input: ResolveInput): ResolvedRun {
  const cwd = input.cwd ?? process.cwd();
  const cli = coerceLayer(input.cli, "command line");
  const vars = input.scenarioVarsFile
    ? coerceLayer(loadScenarioVars(resolve(cwd, input.scenarioVarsFile)), input.scenarioVarsFile)
    : {};

  let scenarioPath = "command line";
  let global: OptionLayer = {};
  let groups: ScenarioSystem[][] = [[{ label: "system1", options: {} }]];
  if (input.scenarioFile) {
    const scenario = loadScenario(resolve(cwd, input.scenarioFile));
    scenarioPath = input.scenarioFile;
    global = coerceLayer(scenario.global, `${scenarioPath} global`);
    groups = scenario.groups;
  }

  let cached = input.catalog ?? null;
  const testDefsFile = cli.test_defs_file ?? vars.test_defs_file ?? global.test_defs_file;
  const catalog = (): TestCatalog => {
    if (!cached) {
      cached = loadTestCatalog(typeof testDefsFile === "string" ? resolve(cwd, testDefsFile) : undefined);
    }
    return cached;
  };

  const layers = { global, vars, cli };
  const resolved = groups.map((group) =>
    group.map((system) => resolveSystem(system, layers, catalog, cwd, scenarioPath))
  );

  const seen = new Set<string>();
  for (const config of resolved.flat()) {
    if (seen.has(config.system)) {
      throw new ConfigurationError(`Duplicate system label ${config.system}`);
    }
    seen.add(config.system);
  }

  const maxSystems = [cli.max_systems, vars.max_systems, global.max_systems]
    .find((v): v is number => typeof v === "number") ?? 4;
  if (maxSystems < 1) throw new ConfigurationError("max_systems must be at least 1");

  return { groups: resolved, maxSystems };
}
