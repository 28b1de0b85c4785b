// workflow/scheduler.ts - Barrier-Grouped System Scheduler
// Groups run one after another; systems within a group run concurrently,
// at most maxSystems at a time. A failing system never cancels siblings.

import { toErrorSummary } from "@zathras/contracts";
import type { SystemRunReport } from "@zathras/contracts";
import type { ResolvedRun, RunConfiguration } from "../config/resolver";
import { Semaphore } from "./semaphore";

export type SystemRunner = (config: RunConfiguration) => Promise<SystemRunReport>;

export async function runGroups(resolved: ResolvedRun, runSystem: SystemRunner): Promise<SystemRunReport[]> {
  const reports: SystemRunReport[] = [];
  const total = resolved.groups.length;

  for (const [index, group] of resolved.groups.entries()) {
    const permits = new Semaphore(resolved.maxSystems);
    console.log(`[scheduler] group ${index + 1}/${total}: ${group.map((c) => c.system).join(", ")}`);

    const settled = await Promise.allSettled(group.map((config) => permits.withPermit(() => runSystem(config))));
    for (const [i, outcome] of settled.entries()) {
      if (outcome.status === "fulfilled") {
        reports.push(outcome.value);
        continue;
      }
      const system = group[i]?.system ?? `#${i}`;
      console.error(`[scheduler] ${system}: pipeline crashed: ${toErrorSummary(outcome.reason).message}`);
      reports.push({
        system,
        status: "failed",
        error: toErrorSummary(outcome.reason),
        attempts: 0,
        results: [],
        bundlePath: null,
      });
    }
    console.log(`[scheduler] group ${index + 1}/${total} complete`);
  }
  return reports;
}
