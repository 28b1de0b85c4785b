// workflow/results.ts - Result Archive Handling
// results_<test>.zip holds results_<test>_.tar, which holds
// <test>_<timestamp>/test_results_report among the wrapper's output.

import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { basename, dirname, join, normalize, sep } from "node:path";
import { unzipSync } from "fflate";
import * as tar from "tar";
import type { TestStatus } from "@zathras/contracts";

export const REPORT_FILE = "test_results_report";

// =============================================================================
// Status
// =============================================================================

const PASS_WORDS = new Set(["PASS", "PASSED", "SUCCESS", "RAN"]);
const FAIL_WORDS = new Set(["FAIL", "FAILED", "ERROR"]);

export interface ParsedStatus {
  status: TestStatus;
  /** PASS, FAIL, UNKNOWN or the report's own (upper-cased) text */
  reportStatus: string;
}

export function parseStatus(content: string): ParsedStatus {
  const text = content.trim().toUpperCase();
  if (PASS_WORDS.has(text)) return { status: "PASS", reportStatus: "PASS" };
  if (FAIL_WORDS.has(text)) return { status: "FAIL", reportStatus: "FAIL" };
  return { status: "FAIL", reportStatus: text || "UNKNOWN" };
}

// =============================================================================
// Extraction
// =============================================================================

function safeEntryPath(root: string, name: string): string | null {
  const rel = normalize(name);
  if (rel.startsWith("..") || rel.startsWith(sep) || rel.split(sep).includes("..")) return null;
  return join(root, rel);
}

function findFile(dir: string, name: string): string | null {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isFile() && entry.name === name) return path;
    if (entry.isDirectory()) {
      const found = findFile(path, name);
      if (found) return found;
    }
  }
  return null;
}

/**
 * Unpack the zip and any tar inside it into destDir. Returns the path of
 * the report file, or null when the archive has none.
 */
export async function extractResultArchive(zipPath: string, destDir: string): Promise<string | null> {
  mkdirSync(destDir, { recursive: true });
  const entries = unzipSync(new Uint8Array(readFileSync(zipPath)));
  const tars: string[] = [];

  for (const [name, data] of Object.entries(entries)) {
    if (name.endsWith("/")) continue;
    const out = safeEntryPath(destDir, name);
    if (!out) {
      console.warn(`[results] skipping unsafe entry ${name} in ${zipPath}`);
      continue;
    }
    mkdirSync(dirname(out), { recursive: true });
    writeFileSync(out, data);
    if (/\.tar(\.gz)?$/.test(name)) tars.push(out);
  }

  for (const file of tars) {
    await tar.x({ file, cwd: destDir });
  }
  return findFile(destDir, REPORT_FILE);
}

/** Status of one test run from its fetched archive; missing pieces are FAIL */
export async function readArchiveStatus(zipPath: string, destDir: string): Promise<ParsedStatus> {
  if (!existsSync(zipPath)) return { status: "FAIL", reportStatus: "MISSING_ARCHIVE" };
  let report: string | null;
  try {
    report = await extractResultArchive(zipPath, destDir);
  } catch (err) {
    console.warn(`[results] cannot read ${zipPath}: ${err instanceof Error ? err.message : String(err)}`);
    return { status: "FAIL", reportStatus: "BAD_ARCHIVE" };
  }
  if (!report) return { status: "FAIL", reportStatus: "MISSING_REPORT" };
  return parseStatus(readFileSync(report, "utf8"));
}

// =============================================================================
// Bundling
// =============================================================================

/** Infra-tool plugin caches; large and reproducible */
function bundleFilter(path: string): boolean {
  return !path.split("/").includes(".terraform");
}

/** Write <dir>.tar.gz next to dir, containing dir itself */
export async function bundleDirectory(dir: string): Promise<string> {
  const file = `${dir}.tar.gz`;
  await tar.c({ gzip: true, file, cwd: dirname(dir), portable: true, filter: bundleFilter }, [basename(dir)]);
  return file;
}
