// workflow/usage.ts - Instance Usage Report
// One line per test run appended to <results_dir>/test_system_usage.

import { existsSync } from "node:fs";
import { appendFile } from "node:fs/promises";
import { join } from "node:path";
import type { RunContext } from "./context";
import { fileLock } from "./semaphore";

export const USAGE_FILE = "test_system_usage";
export const USAGE_HEADER = "User Run_label Instance Date Price Test Time Cost";

/** Cost of `seconds` at an hourly price, rounded to 4 decimals */
export function usageCost(seconds: number, hourlyPrice: number): number {
  return Math.round((seconds * hourlyPrice / 3600) * 10_000) / 10_000;
}

export interface UsageRow {
  user: string;
  runLabel: string;
  instance: string;
  date: string;
  price: number;
  test: string;
  seconds: number;
}

export function usageLine(row: UsageRow): string {
  return [
    row.user,
    row.runLabel,
    row.instance,
    row.date,
    row.price,
    row.test,
    row.seconds,
    usageCost(row.seconds, row.price).toFixed(4),
  ].join(" ");
}

export async function recordUsage(ctx: RunContext, user = process.env.USER ?? "unknown"): Promise<void> {
  if (ctx.results.length === 0) return;
  const date = new Date(ctx.deps.now()).toISOString().slice(0, 10);
  const lines = ctx.results.map((r) =>
    usageLine({
      user,
      runLabel: ctx.config.options.run_label,
      instance: ctx.config.descriptor.instanceType,
      date,
      price: ctx.config.options.instance_price,
      test: r.test,
      seconds: r.durationSeconds,
    })
  );
  const file = join(ctx.config.resultsDir, USAGE_FILE);
  await fileLock.withPermit(async () => {
    const header = existsSync(file) ? "" : `${USAGE_HEADER}\n`;
    await appendFile(file, `${header}${lines.join("\n")}\n`);
  });
}
