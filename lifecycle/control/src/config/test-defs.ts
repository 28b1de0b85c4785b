// config/test-defs.ts - Test Wrapper Catalog
// Loads the YAML catalog of benchmark wrappers. A test entry inherits
// every key of its template and overrides them with its own.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, OS_VENDORS, isOsVendor } from "@zathras/contracts";
import type { OsVendor, RebootMode } from "@zathras/contracts";

// =============================================================================
// Schema
// =============================================================================

const Flag = Type.Union([Type.Boolean(), Type.String()]);

const EntrySchema = Type.Object({
  template: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  location: Type.Optional(Type.String()),
  repo_file: Type.Optional(Type.String()),
  exec_dir: Type.Optional(Type.String()),
  test_script_to_run: Type.Optional(Type.String()),
  test_specific: Type.Optional(Type.String()),
  reboot_system: Type.Optional(Type.String()),
  archive_results: Type.Optional(Flag),
  test_run_from: Type.Optional(Type.String()),
  os_supported: Type.Optional(Type.Array(Type.String())),
  packages: Type.Optional(Type.Record(Type.String(), Type.Array(Type.String()))),
  pbench_required: Type.Optional(Flag),
  pbench_local_results: Type.Optional(Flag),
  storage_required: Type.Optional(Flag),
  network_required: Type.Optional(Flag),
  upload_extra: Type.Optional(Type.Union([Type.String(), Type.Array(Type.String())])),
});

const CatalogSchema = Type.Object({
  templates: Type.Optional(Type.Record(Type.String(), EntrySchema)),
  tests: Type.Record(Type.String(), EntrySchema),
});

type CatalogEntry = Static<typeof EntrySchema>;

// =============================================================================
// Types
// =============================================================================

export interface TestDescriptor {
  name: string;
  description: string;
  /** Base URL; the archive is fetched from `${location}/${repoFile}` */
  location: string;
  repoFile: string;
  /** Directory inside the extracted archive holding the script */
  execDir: string;
  script: string;
  /** Extra wrapper arguments, may contain {{ placeholders }} */
  testSpecific: string;
  rebootSystem: RebootMode;
  archiveResults: boolean;
  runFrom: "remote" | "local";
  osSupported: OsVendor[];
  packages: Record<OsVendor, string[]>;
  pbenchRequired: boolean;
  pbenchLocalResults: boolean;
  storageRequired: boolean;
  networkRequired: boolean;
  uploadExtra: string[];
}

export type TestCatalog = ReadonlyMap<string, TestDescriptor>;

export const DEFAULT_TEST_DEFS = fileURLToPath(new URL("../../config/test_defs.yml", import.meta.url));

// =============================================================================
// Loading
// =============================================================================

function flag(value: boolean | string | undefined): boolean {
  if (typeof value === "boolean") return value;
  return value !== undefined && ["yes", "true", "1"].includes(value.trim().toLowerCase());
}

function rebootMode(value: string | undefined, test: string): RebootMode {
  const v = (value ?? "no").trim().toLowerCase();
  if (v === "before" || v === "after" || v === "both" || v === "no") return v;
  if (v === "none" || v === "false") return "no";
  throw new ConfigurationError(`Test ${test}: reboot_system must be before, after, both or no (got "${value}")`);
}

function requireField(value: string | undefined, field: string, test: string): string {
  if (value === undefined || value.trim() === "") {
    throw new ConfigurationError(`Test ${test}: missing ${field}`);
  }
  return value;
}

function toDescriptor(name: string, e: CatalogEntry): TestDescriptor {
  const runFrom = (e.test_run_from ?? "remote").trim();
  if (runFrom !== "remote" && runFrom !== "local") {
    throw new ConfigurationError(`Test ${name}: test_run_from must be remote or local`);
  }
  const packages: Record<OsVendor, string[]> = { rhel: [], ubuntu: [], amazon: [] };
  for (const [vendor, list] of Object.entries(e.packages ?? {})) {
    if (isOsVendor(vendor)) packages[vendor] = list;
  }
  const upload = e.upload_extra;
  return {
    name,
    description: e.description ?? "",
    location: requireField(e.location, "location", name).replace(/\/+$/, ""),
    repoFile: requireField(e.repo_file, "repo_file", name),
    execDir: requireField(e.exec_dir, "exec_dir", name),
    script: requireField(e.test_script_to_run, "test_script_to_run", name),
    testSpecific: e.test_specific ?? "",
    rebootSystem: rebootMode(e.reboot_system, name),
    archiveResults: flag(e.archive_results),
    runFrom,
    osSupported: (e.os_supported ?? [...OS_VENDORS]).filter(isOsVendor),
    packages,
    pbenchRequired: flag(e.pbench_required),
    pbenchLocalResults: flag(e.pbench_local_results),
    storageRequired: flag(e.storage_required),
    networkRequired: flag(e.network_required),
    uploadExtra: (typeof upload === "string" ? [upload] : upload ?? []).filter((u) => u !== "none" && u !== ""),
  };
}

/** Parse catalog YAML text */
export function parseTestCatalog(text: string, source = "test_defs.yml"): TestCatalog {
  const raw: unknown = parseYaml(text);
  if (!Value.Check(CatalogSchema, raw)) {
    const first = Value.Errors(CatalogSchema, raw).First();
    throw new ConfigurationError(`${source}: ${first ? `${first.path} ${first.message}` : "invalid test catalog"}`);
  }
  const templates = raw.templates ?? {};
  const catalog = new Map<string, TestDescriptor>();
  for (const [name, entry] of Object.entries(raw.tests)) {
    let merged: CatalogEntry = entry;
    if (entry.template !== undefined) {
      const template = templates[entry.template];
      if (!template) {
        throw new ConfigurationError(`${source}: test ${name} uses unknown template ${entry.template}`);
      }
      merged = { ...template, ...entry };
    }
    catalog.set(name, toDescriptor(name, merged));
  }
  return catalog;
}

export function loadTestCatalog(path: string = DEFAULT_TEST_DEFS): TestCatalog {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read test definitions ${path}`, { cause: err });
  }
  return parseTestCatalog(text, path);
}

/** Download URL of a test's packaged source */
export function sourceUrl(test: TestDescriptor): string {
  return `${test.location}/${test.repoFile}`;
}

/**
 * Fill {{ name }} placeholders. Unknown names render empty and are
 * reported through the returned list.
 */
export function renderTestSpecific(
  template: string,
  values: Record<string, string>
): { text: string; missing: string[] } {
  const missing: string[] = [];
  const text = template.replace(/\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g, (_m, key: string) => {
    const v = values[key];
    if (v === undefined) {
      missing.push(key);
      return "";
    }
    return v;
  });
  return { text: text.replace(/\s+/g, " ").trim(), missing };
}
