// workflow/context.ts - Per-System Run Context
// Everything one system's pipeline reads and mutates, passed by reference
// through provision -> install -> tests -> teardown.

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { StageError, TIMING } from "@zathras/contracts";
import type { RunResult, SystemType } from "@zathras/contracts";
import type { RunConfiguration } from "../config/resolver";
import type { TestDescriptor } from "../config/test-defs";
import { getProvider } from "../provider/registry";
import { realExec, realSleep, type ExecFunction, type SleepFunction } from "../provider/exec";
import { SshSession } from "../provider/ssh";
import type { CloudProvider, ProvisionPlan, ProvisionedResource } from "../provider/types";
import { MarkerWriter } from "./markers";

// =============================================================================
// Injected Dependencies
// =============================================================================

/** Download a URL to a local file */
export type SourceFetcher = (url: string, dest: string) => Promise<void>;

export interface RunDeps {
  exec: ExecFunction;
  sleep: SleepFunction;
  now: () => number;
  fetchSource: SourceFetcher;
  getProvider: (name: SystemType) => Promise<CloudProvider>;
}

export const fetchToFile: SourceFetcher = async (url, dest) => {
  const res = await fetch(url, { signal: AbortSignal.timeout(TIMING.DOWNLOAD_TIMEOUT_MS) });
  if (!res.ok) {
    throw new StageError("tests", `Download of ${url} failed: HTTP ${res.status}`, {
      code: "DOWNLOAD_FAILED",
      details: { url, status: res.status },
    });
  }
  writeFileSync(dest, Buffer.from(await res.arrayBuffer()));
};

export function defaultDeps(overrides: Partial<RunDeps> = {}): RunDeps {
  return {
    exec: realExec,
    sleep: realSleep,
    now: Date.now,
    fetchSource: fetchToFile,
    getProvider,
    ...overrides,
  };
}

// =============================================================================
// Run Context
// =============================================================================

export class RunContext {
  readonly workdir: string;
  readonly markers: MarkerWriter;

  /** Tests still to run; spot recovery shrinks this list */
  remainingTests: TestDescriptor[];
  /** Names of tests that finished on every pass */
  readonly completedTests: string[] = [];
  readonly results: RunResult[] = [];
  /** Host groups ("install", "test") and their members */
  readonly hostGroups = new Map<string, string[]>();
  /** "<pass label>/<test>" keys already run; skipped after a spot restart */
  readonly completedRuns = new Set<string>();
  /** Block devices available to storage tests */
  storageDevices: string[] = [];

  provider: CloudProvider | null = null;
  plan: ProvisionPlan | null = null;
  resource: ProvisionedResource | null = null;
  testsStarted = false;
  attempts = 0;

  constructor(
    readonly config: RunConfiguration,
    readonly deps: RunDeps
  ) {
    this.workdir = join(config.resultsDir, config.options.run_label, config.system);
    mkdirSync(this.workdir, { recursive: true });
    this.markers = new MarkerWriter(this.workdir, config.system, deps.now);
    this.remainingTests = [...config.tests];
    this.storageDevices = config.localHost ? [...config.localHost.storage] : [];
  }

  get system(): string {
    return this.config.system;
  }

  /** Log line tagged with component and system */
  log(tag: string, message: string): void {
    console.log(`[${tag}] ${this.system}: ${message}`);
  }

  warn(tag: string, message: string): void {
    console.warn(`[${tag}] ${this.system}: ${message}`);
  }

  addToGroup(group: string, host: string): void {
    const members = this.hostGroups.get(group) ?? [];
    if (!members.includes(host)) {
      members.push(host);
      this.hostGroups.set(group, members);
      this.markers.hostGroup(group, host);
    }
  }

  /** SSH session to the provisioned system */
  ssh(): SshSession {
    if (!this.resource) {
      throw new StageError("install", `${this.system} has no provisioned resource`);
    }
    return this.sshTo(this.resource);
  }

  sshTo(resource: ProvisionedResource): SshSession {
    return new SshSession(
      {
        host: resource.hostname,
        user: this.config.sshUser,
        keyFile: this.config.options.ssh_key_file ?? null,
      },
      this.config.systemType,
      this.deps.exec,
      this.deps.sleep
    );
  }

  /** Shared across systems of the same run label */
  get runDir(): string {
    return join(this.config.resultsDir, this.config.options.run_label);
  }

  /** Home directory of the test user on the system */
  get remoteHome(): string {
    return this.config.sshUser === "root"
      ? "/root"
      : `${this.config.options.user_parent_home_dir}/${this.config.sshUser}`;
  }

  elapsedSeconds(startMs: number): number {
    return Math.round((this.deps.now() - startMs) / 1000);
  }
}
