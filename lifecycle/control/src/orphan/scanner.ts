// orphan/scanner.ts - Leftover Infrastructure Scanner
//
// Walks a results tree for infra directories whose state still lists
// resources. Advisory only; destruction lives in safety.ts.

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { isSystemType } from "@zathras/contracts";
import type { SystemType } from "@zathras/contracts";
import { VAR_FILE } from "../provider/terraform";

// =============================================================================
// Types
// =============================================================================

export interface OrphanRecord {
  /** Infra directory (holds env.tfvars and the templates) */
  dir: string;
  /** Workspace holding the live state; "default" for the root state */
  workspace: string;
  /** Provider read from the workspace name; null when unrecognised */
  provider: SystemType | null;
  resourceCount: number;
  /** Destroy needs the variables file the directory was applied with */
  destroyable: boolean;
}

export interface ScanResult {
  root: string;
  scannedAt: number;
  directoriesScanned: number;
  orphans: OrphanRecord[];
}

const StateSchema = Type.Object({
  resources: Type.Array(Type.Unknown()),
});

// =============================================================================
// Helpers
// =============================================================================

/** Resources listed in a state file; 0 when unreadable or empty */
export function countStateResources(stateFile: string): number {
  try {
    const parsed: unknown = JSON.parse(readFileSync(stateFile, "utf8"));
    return Value.Check(StateSchema, parsed) ? parsed.resources.length : 0;
  } catch (err) {
    console.warn(`[orphan] unreadable state ${stateFile}: ${err instanceof Error ? err.message : String(err)}`);
    return 0;
  }
}

/** "<type>-<run_label>-<system>" workspace names carry the provider */
export function providerFromWorkspace(workspace: string): SystemType | null {
  const prefix = workspace.split("-")[0] ?? "";
  return isSystemType(prefix) ? prefix : null;
}

function stateFiles(dir: string): Array<{ workspace: string; file: string }> {
  const found: Array<{ workspace: string; file: string }> = [];
  const root = join(dir, "terraform.tfstate");
  if (existsSync(root)) found.push({ workspace: "default", file: root });

  const wsRoot = join(dir, "terraform.tfstate.d");
  if (existsSync(wsRoot)) {
    for (const entry of readdirSync(wsRoot, { withFileTypes: true })) {
      const file = join(wsRoot, entry.name, "terraform.tfstate");
      if (entry.isDirectory() && existsSync(file)) found.push({ workspace: entry.name, file });
    }
  }
  return found;
}

function isInfraDir(dir: string): boolean {
  return existsSync(join(dir, "terraform.tfstate")) || existsSync(join(dir, "terraform.tfstate.d"));
}

// =============================================================================
// Scan
// =============================================================================

export function scanResultsTree(root: string, now: () => number = Date.now): ScanResult {
  const orphans: OrphanRecord[] = [];
  let directoriesScanned = 0;

  const walk = (dir: string): void => {
    directoriesScanned++;
    if (isInfraDir(dir)) {
      for (const { workspace, file } of stateFiles(dir)) {
        const resourceCount = countStateResources(file);
        if (resourceCount === 0) continue;
        orphans.push({
          dir,
          workspace,
          provider: providerFromWorkspace(workspace),
          resourceCount,
          destroyable: existsSync(join(dir, VAR_FILE)),
        });
      }
      return;
    }
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      if (entry.isDirectory() && entry.name !== ".terraform") walk(join(dir, entry.name));
    }
  };

  if (existsSync(root)) walk(root);
  console.log(`[orphan] scanned ${directoriesScanned} directories under ${root}: ${orphans.length} with live resources`);
  return { root, scannedAt: now(), directoriesScanned, orphans };
}
