// tests/unit/orphan.test.ts - Leftover infrastructure scan and guarded destroy

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { safeDestroyBatch, safeDestroyOrphan } from "../../control/src/orphan/safety";
import {
  countStateResources,
  providerFromWorkspace,
  scanResultsTree,
  type OrphanRecord,
} from "../../control/src/orphan/scanner";
import { FakeExec, setupTest, writeFile, type TestEnv } from "../harness";

let env: TestEnv;
beforeEach(() => { env = setupTest(); });
afterEach(() => env.cleanup());

const state = (n: number): string => JSON.stringify({ version: 4, resources: Array.from({ length: n }, (_, i) => ({ name: `r${i}` })) });

function orphan(overrides: Partial<OrphanRecord> = {}): OrphanRecord {
  return {
    dir: join(env.dir, "tf"),
    workspace: "aws-perf-system1",
    provider: "aws",
    resourceCount: 2,
    destroyable: true,
    ...overrides,
  };
}

describe("scanResultsTree", () => {
  test("reports infra directories whose state still lists resources", () => {
    const root = join(env.dir, "results");
    writeFile(root, "run1/sys1/tf/terraform.tfstate.d/aws-perf-sys1/terraform.tfstate", state(2));
    writeFile(root, "run1/sys1/tf/env.tfvars", 'vm_type = "m5.xlarge"\n');
    writeFile(root, "run1/sys2/tf/terraform.tfstate", state(1));
    writeFile(root, "run1/sys3/tf/terraform.tfstate.d/azure-perf-sys3/terraform.tfstate", state(0));
    writeFile(root, "run1/sys4/tf/terraform.tfstate.d/gcp-perf-sys4/terraform.tfstate", "not json");

    const scan = scanResultsTree(root, () => 42);
    const orphans = [...scan.orphans].sort((a, b) => a.dir.localeCompare(b.dir));

    expect(scan.scannedAt).toBe(42);
    expect(scan.directoriesScanned).toBe(10);
    expect(orphans).toEqual([
      {
        dir: join(root, "run1/sys1/tf"),
        workspace: "aws-perf-sys1",
        provider: "aws",
        resourceCount: 2,
        destroyable: true,
      },
      {
        dir: join(root, "run1/sys2/tf"),
        workspace: "default",
        provider: null,
        resourceCount: 1,
        destroyable: false,
      },
    ]);
  });

  test("missing root scans nothing", () => {
    const scan = scanResultsTree(join(env.dir, "absent"));
    expect(scan.directoriesScanned).toBe(0);
    expect(scan.orphans).toEqual([]);
  });

  test("helpers", () => {
    expect(countStateResources(writeFile(env.dir, "s.tfstate", state(3)))).toBe(3);
    expect(countStateResources(writeFile(env.dir, "bad.tfstate", '{"resources": 5}'))).toBe(0);
    expect(providerFromWorkspace("azure-perf-sys1")).toBe("azure");
    expect(providerFromWorkspace("default")).toBeNull();
  });
});

describe("safeDestroyOrphan", () => {
  test("unknown provider and missing variables are skipped", async () => {
    const exec = new FakeExec();
    expect((await safeDestroyOrphan({ orphan: orphan({ provider: null }), dryRun: false }, exec.exec)).action)
      .toBe("skipped_unknown_provider");
    expect((await safeDestroyOrphan({ orphan: orphan({ destroyable: false }), dryRun: false }, exec.exec)).action)
      .toBe("skipped_no_vars");
    expect((await safeDestroyOrphan({ orphan: orphan(), dryRun: true }, exec.exec)).action)
      .toBe("skipped_dry_run");
    expect(exec.calls).toHaveLength(0);
  });

  test("destroys in the recorded workspace", async () => {
    const exec = new FakeExec();
    const result = await safeDestroyOrphan({ orphan: orphan(), dryRun: false }, exec.exec);
    expect(result).toEqual({ dir: join(env.dir, "tf"), workspace: "aws-perf-system1", action: "destroyed" });
    expect(exec.lines()).toEqual([
      "terraform init -no-color -input=false",
      "terraform workspace select -no-color aws-perf-system1",
      "terraform destroy -no-color -input=false -auto-approve -var-file=env.tfvars",
    ]);
  });

  test("a failed destroy is reported, and the batch continues", async () => {
    const exec = new FakeExec().on("terraform destroy", { exitCode: 1, stderr: "Error: DependencyViolation" });
    const results = await safeDestroyBatch([
      { orphan: orphan(), dryRun: false },
      { orphan: orphan({ provider: null }), dryRun: false },
    ], exec.exec);
    expect(results.map((r) => r.action)).toEqual(["failed", "skipped_unknown_provider"]);
    expect(results[0]?.reason).toBe("terraform destroy failed: Error: DependencyViolation");
  });
});
