// workflow/markers.ts - Post-Mortem Marker Files
// Human-readable files in the system's working directory. Nothing reads
// them back during a run; they exist so a crashed run can be diagnosed.

import { appendFileSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ProvisionState, StepStatus } from "@zathras/contracts";

export const MARKER_FILES = {
  progress: "progress.log",
  provisionState: "provision_state",
  testTimes: "test_times",
  cloudTimings: "cloud_timings",
  hostGroupSuffix: "_group",
} as const;

export class MarkerWriter {
  constructor(
    readonly dir: string,
    private readonly system: string,
    private readonly now: () => number = Date.now
  ) {
    mkdirSync(dir, { recursive: true });
  }

  progress(message: string): void {
    const stamp = new Date(this.now()).toISOString();
    appendFileSync(join(this.dir, MARKER_FILES.progress), `${stamp} ${this.system} ${message}\n`);
  }

  provisionState(state: ProvisionState, detail?: string): void {
    writeFileSync(join(this.dir, MARKER_FILES.provisionState), `${state}\n`);
    this.progress(detail ? `${state} ${detail}` : state);
  }

  stepStatus(step: string, status: StepStatus): void {
    writeFileSync(join(this.dir, `${step}.status`), `status: ${status}\n`);
  }

  testTime(test: string, seconds: number): void {
    appendFileSync(join(this.dir, MARKER_FILES.testTimes), `test: ${test} execution time ${seconds}\n`);
  }

  cloudTiming(phase: "instance_start" | "instance_ready" | "terminate", seconds: number): void {
    appendFileSync(join(this.dir, MARKER_FILES.cloudTimings), `${phase}: ${seconds}\n`);
  }

  hostGroup(group: string, host: string): void {
    appendFileSync(join(this.dir, `${group}${MARKER_FILES.hostGroupSuffix}`), `${host}\n`);
  }
}
