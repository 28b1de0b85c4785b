// orphan/safety.ts - Guarded destruction of leftover infrastructure
//
// Nothing is destroyed without an explicit request; dry-run reports what
// would happen.

import { errorMessage } from "@zathras/contracts";
import { realExec, type ExecFunction } from "../provider/exec";
import { TerraformRunner, terraformEnvFor } from "../provider/terraform";
import type { OrphanRecord } from "./scanner";

export interface DestroyRequest {
  orphan: OrphanRecord;
  dryRun: boolean;
}

export interface DestroyResult {
  dir: string;
  workspace: string;
  action: "destroyed" | "skipped_dry_run" | "skipped_unknown_provider" | "skipped_no_vars" | "failed";
  reason?: string;
}

export async function safeDestroyOrphan(
  req: DestroyRequest,
  exec: ExecFunction = realExec
): Promise<DestroyResult> {
  const { orphan, dryRun } = req;
  const base = { dir: orphan.dir, workspace: orphan.workspace };

  if (!orphan.provider) {
    console.log(`[orphan] skipped_unknown_provider dir=${orphan.dir} workspace=${orphan.workspace}`);
    return { ...base, action: "skipped_unknown_provider", reason: "workspace name does not name a provider" };
  }
  if (!orphan.destroyable) {
    console.log(`[orphan] skipped_no_vars dir=${orphan.dir}`);
    return { ...base, action: "skipped_no_vars", reason: "variables file missing" };
  }
  if (dryRun) {
    console.log(`[orphan] skipped_dry_run dir=${orphan.dir} workspace=${orphan.workspace} (would destroy ${orphan.resourceCount} resources)`);
    return { ...base, action: "skipped_dry_run", reason: "dry-run mode" };
  }

  try {
    const tf = new TerraformRunner(orphan.provider, exec, terraformEnvFor(orphan.provider));
    await tf.init(orphan.dir);
    await tf.selectWorkspace(orphan.dir, orphan.workspace);
    await tf.destroy(orphan.dir);
    console.log(`[orphan] destroyed dir=${orphan.dir} workspace=${orphan.workspace}`);
    return { ...base, action: "destroyed" };
  } catch (err) {
    console.error(`[orphan] destroy failed dir=${orphan.dir}: ${errorMessage(err)}`);
    return { ...base, action: "failed", reason: errorMessage(err) };
  }
}

/** Sequential; one infra tool run at a time */
export async function safeDestroyBatch(
  requests: DestroyRequest[],
  exec: ExecFunction = realExec
): Promise<DestroyResult[]> {
  const results: DestroyResult[] = [];
  for (const req of requests) {
    results.push(await safeDestroyOrphan(req, exec));
  }
  return results;
}
