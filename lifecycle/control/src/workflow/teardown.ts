// workflow/teardown.ts - Teardown
// Bundle results first, then destroy. Never throws: a teardown problem is
// logged and left for `zathras cleanup`.

import { errorMessage } from "@zathras/contracts";
import type { RunContext } from "./context";
import { bundleDirectory } from "./results";

export interface TeardownOutcome {
  bundlePath: string | null;
  destroyed: boolean;
}

export async function teardown(ctx: RunContext): Promise<TeardownOutcome> {
  let bundlePath: string | null = null;
  try {
    bundlePath = await bundleDirectory(ctx.workdir);
    ctx.log("teardown", `results bundled in ${bundlePath}`);
  } catch (err) {
    ctx.warn("teardown", `bundling ${ctx.workdir} failed: ${errorMessage(err)}`);
  }

  const { provider, plan } = ctx;
  if (!provider || !plan || !provider.capabilities.infrastructure) {
    return { bundlePath, destroyed: false };
  }
  if (!ctx.config.options.terminate_cloud) {
    ctx.warn("teardown", `terminate_cloud is off; resources left running (state in ${plan.infraDir ?? "?"})`);
    ctx.markers.progress("teardown skipped (terminate_cloud=false)");
    return { bundlePath, destroyed: false };
  }

  const started = ctx.deps.now();
  try {
    await provider.destroy(plan);
    ctx.plan = null;
    ctx.markers.cloudTiming("terminate", ctx.elapsedSeconds(started));
    ctx.markers.progress("resources destroyed");
    ctx.log("teardown", "resources destroyed");
    return { bundlePath, destroyed: true };
  } catch (err) {
    ctx.warn("teardown", `destroy failed, run "zathras cleanup ${ctx.config.resultsDir}": ${errorMessage(err)}`);
    ctx.markers.progress(`destroy FAILED: ${errorMessage(err)}`);
    return { bundlePath, destroyed: false };
  }
}
