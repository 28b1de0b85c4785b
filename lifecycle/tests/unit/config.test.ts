// tests/unit/config.test.ts - Option coercion, precedence and scenario grouping

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { ConfigurationError } from "@zathras/contracts";
import { coerceOption, coerceLayer } from "../../control/src/config/options";
import { buildPasses, passLabel, resolveRun } from "../../control/src/config/resolver";
import { parseScenario } from "../../control/src/config/scenario";
import { setupTest, writeFile, writeLocalHost, type TestEnv } from "../harness";

let env: TestEnv;
beforeEach(() => { env = setupTest(); });
afterEach(() => env.cleanup());

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

// =============================================================================
// Coercion
// =============================================================================

describe("coerceOption", () => {
  test("booleans accept yes/no words", () => {
    expect(coerceOption("spot_recover", "yes", "cli")).toBe(true);
    expect(coerceOption("spot_recover", "OFF", "cli")).toBe(false);
    expect(coerceOption("terminate_cloud", false, "cli")).toBe(false);
  });

  test("lists split on commas; none is empty", () => {
    expect(coerceOption("tests", "streams, fio", "cli")).toEqual(["streams", "fio"]);
    expect(coerceOption("tests", ["linpack", 5], "cli")).toEqual(["linpack", "5"]);
    expect(coerceOption("sysctl_settings", "none", "cli")).toEqual([]);
  });

  test("maps from key=value pairs", () => {
    expect(coerceOption("tags", "team=perf,env=ci", "cli")).toEqual({ team: "perf", env: "ci" });
  });

  test("ints reject fractions", () => {
    expect(coerceOption("test_iterations", "3", "cli")).toBe(3);
    const err = configError(() => coerceOption("test_iterations", "2.5", "cli"));
    expect(err.message).toBe('Option test_iterations (cli): expected int, got "2.5"');
  });

  test("unknown option names are rejected", () => {
    const err = configError(() => coerceLayer({ bogus: 1 }, "command line"));
    expect(err.message).toBe('Unknown option "bogus" in command line');
    expect(err.code).toBe("UNKNOWN_OPTION");
  });
});

// =============================================================================
// Scenario Grouping
// =============================================================================

describe("parseScenario", () => {
  test("barriers split systems into ordered groups", () => {
    const scenario = parseScenario({
      global: { system_type: "aws" },
      systems: {
        sys_a: { host_config: "m5.xlarge" },
        fence: { host_config: "SYS_BARRIER" },
        sys_b: { host_config: "m6i.xlarge" },
        sys_c: { host_config: "m6i.2xlarge" },
        SYS_BARRIER: null,
        sys_d: null,
      },
    }, "scenario.yml");
    expect(scenario.groups.map((g) => g.map((s) => s.label))).toEqual([
      ["sys_a"],
      ["sys_b", "sys_c"],
      ["sys_d"],
    ]);
    expect(scenario.global).toEqual({ system_type: "aws" });
  });

  test("leading and doubled barriers leave no empty groups", () => {
    const scenario = parseScenario({
      systems: {
        b1: { host_config: "SYS_BARRIER" },
        only: { host_config: "m5.large" },
        b2: { host_config: "SYS_BARRIER" },
        b3: { host_config: "SYS_BARRIER" },
      },
    }, "s.yml");
    expect(scenario.groups.map((g) => g.map((s) => s.label))).toEqual([["only"]]);
  });

  test("a scenario with only barriers is rejected", () => {
    const err = configError(() => parseScenario({ systems: { b: { host_config: "SYS_BARRIER" } } }, "s.yml"));
    expect(err.message).toBe("Scenario s.yml declares no systems");
  });
});

// =============================================================================
// Resolution
// =============================================================================

const SCENARIO = `
global:
  system_type: aws
  os_vendor: rhel
  tests: streams
  test_iterations: 2
  run_label: from_global
systems:
  sys_a:
    host_config: m5.xlarge
    test_iterations: 3
    run_label: from_system
  barrier:
    host_config: SYS_BARRIER
  sys_b:
    host_config: m6i.xlarge
`;

describe("resolveRun", () => {
  test("precedence: global < system < scenario-vars < command line", () => {
    writeFile(env.dir, "scenario.yml", SCENARIO);
    writeFile(env.dir, "vars.yml", "run_label: from_vars\n");

    const resolved = resolveRun({
      cli: {},
      scenarioFile: "scenario.yml",
      scenarioVarsFile: "vars.yml",
      cwd: env.dir,
    });
    expect(resolved.groups.map((g) => g.map((c) => c.system))).toEqual([["sys_a"], ["sys_b"]]);
    const [a, b] = resolved.groups.flat();
    expect(a?.options.test_iterations).toBe(3);
    expect(b?.options.test_iterations).toBe(2);
    expect(a?.options.run_label).toBe("from_vars");

    const withCli = resolveRun({
      cli: { run_label: "from_cli" },
      scenarioFile: "scenario.yml",
      scenarioVarsFile: "vars.yml",
      cwd: env.dir,
    });
    expect(withCli.groups.flat().map((c) => c.options.run_label)).toEqual(["from_cli", "from_cli"]);
  });

  test("cloud defaults fill ssh user and region comes from options", () => {
    const resolved = resolveRun({
      cli: { system_type: "aws", host_config: "m5.xlarge", tests: "streams", cloud_region: "us-west-2" },
      cwd: env.dir,
    });
    const config = resolved.groups[0]?.[0];
    expect(config?.system).toBe("system1");
    expect(config?.sshUser).toBe("ec2-user");
    expect(config?.descriptor.region).toBe("us-west-2");
    expect(config?.resultsDir).toBe(join(env.dir, "results"));
    expect(config?.passes).toEqual([{ label: "tuned_none_sys_file_none", sysctl: null, tuned: null }]);
    expect(resolved.maxSystems).toBe(4);
  });

  test("descriptor location wins over cloud_region", () => {
    const resolved = resolveRun({
      cli: { system_type: "aws", host_config: "m5.xlarge[region=eu-west-1]", tests: "streams", cloud_region: "us-west-2" },
      cwd: env.dir,
    });
    expect(resolved.groups[0]?.[0]?.descriptor.region).toBe("eu-west-1");
  });

  test("resolved configurations are frozen", () => {
    const resolved = resolveRun({
      cli: { system_type: "aws", host_config: "m5.xlarge", tests: "streams" },
      cwd: env.dir,
    });
    const config = resolved.groups[0]?.[0];
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config?.options)).toBe(true);
  });

  test("local systems load their host config and run as root", () => {
    writeLocalHost(env.dir, "test_sys", "storage: /dev/nvme1n1,/dev/nvme2n1\nserver_ips: 10.1.1.2\n");
    const resolved = resolveRun({
      cli: { system_type: "local", host_config: "test_sys", tests: "fio" },
      cwd: env.dir,
    });
    const config = resolved.groups[0]?.[0];
    expect(config?.sshUser).toBe("root");
    expect(config?.localHost?.storage).toEqual(["/dev/nvme1n1", "/dev/nvme2n1"]);
    expect(config?.localHost?.serverIps).toEqual(["10.1.1.2"]);
    expect(config?.configDir).toBe(join(env.dir, "local_configs"));
  });

  test("missing required option", () => {
    const err = configError(() => resolveRun({ cli: { system_type: "aws" }, cwd: env.dir }));
    expect(err.message).toBe("system1: missing required option host_config");
    expect(err.code).toBe("MISSING_REQUIRED_OPTION");
  });

  test("unknown test", () => {
    const err = configError(() =>
      resolveRun({ cli: { system_type: "aws", host_config: "m5.xlarge", tests: "nosuch" }, cwd: env.dir })
    );
    expect(err.message).toBe("system1: unknown test nosuch");
    expect(err.code).toBe("UNKNOWN_TEST");
  });

  test("test not supported on the os vendor", () => {
    const err = configError(() =>
      resolveRun({
        cli: { system_type: "aws", host_config: "m5.xlarge", tests: "uperf", os_vendor: "amazon" },
        cwd: env.dir,
      })
    );
    expect(err.message).toBe("system1: test uperf does not support amazon");
  });

  test("storage test without disks", () => {
    const err = configError(() =>
      resolveRun({ cli: { system_type: "aws", host_config: "m5.xlarge", tests: "fio" }, cwd: env.dir })
    );
    expect(err.message).toBe("system1: test fio needs storage but the descriptor has no Disks group");
  });

  test("spot on a provider without spot", () => {
    const err = configError(() =>
      resolveRun({
        cli: { system_type: "ibm", host_config: "bx2-4x16", tests: "streams", spot_range: "0.10" },
        cwd: env.dir,
      })
    );
    expect(err.message).toBe("system1: ibm does not support spot instances");
  });

  test("malformed descriptor aborts resolution", () => {
    expect(() =>
      resolveRun({
        cli: { system_type: "aws", host_config: "m5.xlarge:Disks;number=abc", tests: "streams" },
        cwd: env.dir,
      })
    ).toThrow('Non-numeric value for number: "number=abc" (at offset 16)');
  });

  test("missing local host config", () => {
    const err = configError(() =>
      resolveRun({ cli: { system_type: "local", host_config: "ghost", tests: "streams" }, cwd: env.dir })
    );
    expect(err.code).toBe("LOCAL_CONFIG_MISSING");
  });
});

// =============================================================================
// Tuning Passes
// =============================================================================

describe("buildPasses", () => {
  test("sysctl profiles x tuned profiles on rhel", () => {
    const resolved = resolveRun({
      cli: {
        system_type: "aws",
        host_config: "m5.xlarge:Sysctl_settings;name=net",
        tests: "streams",
        tuned_settings: "throughput-performance,latency-performance",
      },
      cwd: env.dir,
    });
    const config = resolved.groups[0]?.[0];
    expect(config?.passes.map((p) => p.label)).toEqual([
      "tuned_throughput-performance_sys_file_net",
      "tuned_latency-performance_sys_file_net",
    ]);
  });

  test("tuned is ignored off rhel", () => {
    const resolved = resolveRun({
      cli: { system_type: "aws", host_config: "m5.xlarge", tests: "streams", os_vendor: "ubuntu", tuned_settings: "balanced" },
      cwd: env.dir,
    });
    const config = resolved.groups[0]?.[0];
    if (!config) throw new Error("no config");
    expect(buildPasses(config.options, config.descriptor)).toEqual([
      { label: passLabel(null, null), sysctl: null, tuned: null },
    ]);
  });
});
