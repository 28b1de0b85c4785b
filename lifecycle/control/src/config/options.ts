// config/options.ts - Run Options Schema & Coercion
// Options arrive as strings (CLI) or YAML scalars/lists (scenario files).
// Each value is coerced by its declared kind, then the merged set is
// filled with defaults and validated against the TypeBox schema.

import { Type, type Static, type TLiteral } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, OS_VENDORS, SYSTEM_TYPES } from "@zathras/contracts";
import { TIMING } from "@zathras/contracts";

// =============================================================================
// Schema
// =============================================================================

function literals<T extends string>(values: readonly T[]): TLiteral<T>[] {
  return values.map((v) => Type.Literal(v));
}

export const RunOptionsSchema = Type.Object({
  // What to run where
  system_type: Type.Union(literals(SYSTEM_TYPES)),
  host_config: Type.String({ minLength: 1 }),
  tests: Type.Array(Type.String(), { default: [] }),
  run_label: Type.String({ minLength: 1, default: "zathras" }),
  os_vendor: Type.Union(literals(OS_VENDORS), { default: "rhel" }),

  // Cloud placement
  cloud_os_id: Type.Optional(Type.String()),
  cloud_region: Type.Optional(Type.String()),
  cloud_zone: Type.Optional(Type.String()),
  cloud_resource_group: Type.Optional(Type.String()),
  ssh_key_file: Type.Optional(Type.String()),
  test_user: Type.Optional(Type.String()),
  user_parent_home_dir: Type.String({ default: "/home" }),
  tags: Type.Record(Type.String(), Type.String(), { default: {} }),

  // Retry / fallback
  spot_range: Type.Array(Type.String(), { default: [] }),
  spot_recover: Type.Boolean({ default: true }),
  create_attempts: Type.Integer({ minimum: 1, default: TIMING.DEFAULT_CREATE_ATTEMPTS }),
  cpu_type_request: Type.Optional(Type.String()),

  // Install / tuning
  tuned_settings: Type.Array(Type.String(), { default: [] }),
  tuned_reboot: Type.Boolean({ default: false }),
  sysctl_settings: Type.Array(Type.String(), { default: [] }),
  selinux_state: Type.Union(literals(["enabled", "disabled", "none"] as const), { default: "none" }),
  selinux_level: Type.Union(literals(["enforcing", "permissive"] as const), { default: "enforcing" }),
  pbench_install: Type.Boolean({ default: false }),
  do_not_install_packages: Type.Boolean({ default: false }),
  error_repo_errors: Type.Boolean({ default: true }),
  packages: Type.Array(Type.String(), { default: [] }),
  upload_extra: Type.Array(Type.String(), { default: [] }),
  os_update: Type.Boolean({ default: false }),

  // Test execution
  test_iterations: Type.Integer({ minimum: 1, default: 1 }),
  execute_tests: Type.Boolean({ default: true }),
  abort_on_test_failure: Type.Boolean({ default: false }),
  terminate_cloud: Type.Boolean({ default: true }),
  instance_price: Type.Number({ minimum: 0, default: 0 }),

  // Files and scheduling
  local_config_dir: Type.String({ default: "local_configs" }),
  results_dir: Type.String({ default: "results" }),
  test_defs_file: Type.Optional(Type.String()),
  max_systems: Type.Integer({ minimum: 1, default: 4 }),
});

export type RunOptions = Static<typeof RunOptionsSchema>;
export type OptionName = keyof RunOptions;

// =============================================================================
// Option Kinds
// =============================================================================

export type OptionKind = "string" | "int" | "number" | "bool" | "list" | "map";

export const OPTION_KINDS = {
  system_type: "string",
  host_config: "string",
  tests: "list",
  run_label: "string",
  os_vendor: "string",
  cloud_os_id: "string",
  cloud_region: "string",
  cloud_zone: "string",
  cloud_resource_group: "string",
  ssh_key_file: "string",
  test_user: "string",
  user_parent_home_dir: "string",
  tags: "map",
  spot_range: "list",
  spot_recover: "bool",
  create_attempts: "int",
  cpu_type_request: "string",
  tuned_settings: "list",
  tuned_reboot: "bool",
  sysctl_settings: "list",
  selinux_state: "string",
  selinux_level: "string",
  pbench_install: "bool",
  do_not_install_packages: "bool",
  error_repo_errors: "bool",
  packages: "list",
  upload_extra: "list",
  os_update: "bool",
  test_iterations: "int",
  execute_tests: "bool",
  abort_on_test_failure: "bool",
  terminate_cloud: "bool",
  instance_price: "number",
  local_config_dir: "string",
  results_dir: "string",
  test_defs_file: "string",
  max_systems: "int",
} as const satisfies Record<OptionName, OptionKind>;

export const OPTION_NAMES: readonly OptionName[] = Object.keys(OPTION_KINDS).filter(isOptionName);

export function isOptionName(key: string): key is OptionName {
  return Object.prototype.hasOwnProperty.call(OPTION_KINDS, key);
}

export const REQUIRED_OPTIONS: readonly OptionName[] = ["system_type", "host_config"];

// =============================================================================
// Coercion
// =============================================================================

export type OptionValue = string | number | boolean | string[] | Record<string, string>;

/** Options from one source, already coerced */
export type OptionLayer = Partial<Record<OptionName, OptionValue>>;

const TRUE_WORDS = new Set(["true", "yes", "y", "1", "on"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0", "off"]);

function scalarToString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

function typeError(name: string, kind: OptionKind, value: unknown, source: string): ConfigurationError {
  return new ConfigurationError(
    `Option ${name} (${source}): expected ${kind}, got ${JSON.stringify(value)}`,
    { code: "INVALID_OPTION", details: { option: name, source } }
  );
}

/** Coerce one raw value to the option's kind */
export function coerceOption(name: OptionName, value: unknown, source: string): OptionValue {
  const kind: OptionKind = OPTION_KINDS[name];
  switch (kind) {
    case "string": {
      const s = scalarToString(value);
      if (s === null) throw typeError(name, kind, value, source);
      return s.trim();
    }
    case "int":
    case "number": {
      const n = typeof value === "number" ? value : typeof value === "string" && value.trim() !== "" ? Number(value) : NaN;
      if (!Number.isFinite(n) || (kind === "int" && !Number.isInteger(n))) throw typeError(name, kind, value, source);
      return n;
    }
    case "bool": {
      if (typeof value === "boolean") return value;
      const s = scalarToString(value)?.trim().toLowerCase();
      if (s !== undefined && TRUE_WORDS.has(s)) return true;
      if (s !== undefined && FALSE_WORDS.has(s)) return false;
      throw typeError(name, kind, value, source);
    }
    case "list": {
      if (value === null) return [];
      if (Array.isArray(value)) {
        const items: string[] = [];
        for (const item of value) {
          const s = scalarToString(item);
          if (s === null) throw typeError(name, kind, value, source);
          if (s.trim()) items.push(s.trim());
        }
        return items;
      }
      const s = scalarToString(value);
      if (s === null) throw typeError(name, kind, value, source);
      const items = s.split(",").map((x) => x.trim()).filter(Boolean);
      return items.length === 1 && items[0] === "none" ? [] : items;
    }
    case "map": {
      if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        const out: Record<string, string> = {};
        for (const [k, v] of Object.entries(value)) {
          const s = scalarToString(v);
          if (s === null) throw typeError(name, kind, value, source);
          out[k] = s;
        }
        return out;
      }
      const s = scalarToString(value);
      if (s === null) throw typeError(name, kind, value, source);
      const out: Record<string, string> = {};
      for (const pair of s.split(",").map((x) => x.trim()).filter(Boolean)) {
        const eq = pair.indexOf("=");
        if (eq <= 0) throw typeError(name, kind, value, source);
        out[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
      }
      return out;
    }
  }
}

/**
 * Coerce a raw key/value map from one source. Unknown keys are rejected so
 * a typo in a scenario file doesn't silently fall back to a default.
 */
export function coerceLayer(raw: Record<string, unknown>, source: string): OptionLayer {
  const layer: OptionLayer = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isOptionName(key)) {
      throw new ConfigurationError(`Unknown option "${key}" in ${source}`, {
        code: "UNKNOWN_OPTION",
        details: { option: key, source },
      });
    }
    layer[key] = coerceOption(key, value, source);
  }
  return layer;
}

/**
 * Merge layers lowest-precedence first, fill defaults, validate.
 * `label` names the system in error messages.
 */
export function finalizeOptions(layers: OptionLayer[], label: string): RunOptions {
  const merged: OptionLayer = {};
  for (const layer of layers) Object.assign(merged, layer);

  for (const name of REQUIRED_OPTIONS) {
    if (merged[name] === undefined || merged[name] === "") {
      throw new ConfigurationError(`${label}: missing required option ${name}`, {
        code: "MISSING_REQUIRED_OPTION",
        details: { option: name, system: label },
      });
    }
  }

  const candidate: unknown = Value.Default(RunOptionsSchema, Value.Clone(merged));
  if (!Value.Check(RunOptionsSchema, candidate)) {
    const first = Value.Errors(RunOptionsSchema, candidate).First();
    const where = first ? first.path.replace(/^\//, "") : "options";
    throw new ConfigurationError(`${label}: invalid ${where}: ${first?.message ?? "does not match schema"}`, {
      code: "INVALID_OPTION",
      details: { system: label, option: where },
    });
  }
  return candidate;
}
