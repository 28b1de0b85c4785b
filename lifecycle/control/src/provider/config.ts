// provider/config.ts - Provider defaults and credentials
//
// Reads ~/.zathras/providers.yml (or $ZATHRAS_PROVIDERS_CONFIG) for per-cloud
// defaults. Credentials themselves stay in the environment variables each
// cloud's tooling expects; this module only checks they are present.

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { CloudSystemType } from "@zathras/contracts";
import { AuthError } from "./errors";

// =============================================================================
// Provider Config Types
// =============================================================================

const CloudDefaultsSchema = Type.Object({
  region: Type.Optional(Type.String()),
  zone: Type.Optional(Type.String()),
  os_image: Type.Optional(Type.String()),
  ssh_user: Type.Optional(Type.String()),
});

const ProviderConfigSchema = Type.Object({
  aws: Type.Optional(CloudDefaultsSchema),
  azure: Type.Optional(CloudDefaultsSchema),
  gcp: Type.Optional(CloudDefaultsSchema),
  ibm: Type.Optional(CloudDefaultsSchema),
});

export type CloudDefaults = Static<typeof CloudDefaultsSchema>;
export type ProviderConfig = Static<typeof ProviderConfigSchema>;

const BUILTIN_DEFAULTS: Record<CloudSystemType, Required<Pick<CloudDefaults, "region" | "ssh_user">>> = {
  aws: { region: "us-east-1", ssh_user: "ec2-user" },
  azure: { region: "eastus", ssh_user: "azureuser" },
  gcp: { region: "us-central1", ssh_user: "zathras" },
  ibm: { region: "us-south", ssh_user: "root" },
};

/** Environment variables each cloud needs; any one of a group suffices */
const REQUIRED_ENV: Record<CloudSystemType, string[][]> = {
  aws: [],
  azure: [["ARM_SUBSCRIPTION_ID", "AZURE_SUBSCRIPTION_ID"]],
  gcp: [["GOOGLE_PROJECT", "CLOUDSDK_CORE_PROJECT"]],
  ibm: [["IC_API_KEY", "IBMCLOUD_API_KEY"]],
};

// =============================================================================
// Load Config
// =============================================================================

function getConfigPath(): string {
  return process.env.ZATHRAS_PROVIDERS_CONFIG ?? join(homedir(), ".zathras", "providers.yml");
}

let _cachedConfig: ProviderConfig | null = null;

/**
 * Load provider configuration. Falls back to empty config if the file
 * doesn't exist or doesn't validate. Cached after first load.
 */
export function loadProviderConfig(): ProviderConfig {
  if (_cachedConfig) return _cachedConfig;

  const configPath = getConfigPath();
  if (!existsSync(configPath)) {
    _cachedConfig = {};
    return _cachedConfig;
  }

  const raw: unknown = parseYaml(readFileSync(configPath, "utf-8"));
  if (Value.Check(ProviderConfigSchema, raw)) {
    _cachedConfig = raw;
  } else {
    const first = Value.Errors(ProviderConfigSchema, raw).First();
    console.warn(`[config] Ignoring ${configPath}: ${first ? `${first.path} ${first.message}` : "invalid"}`);
    _cachedConfig = {};
  }
  return _cachedConfig;
}

/** Clear the cached config. Test-only. */
export function clearConfigCache(): void {
  _cachedConfig = null;
}

/**
 * Effective defaults for one cloud. Precedence: config file > env > built-in.
 */
export function getCloudDefaults(cloud: CloudSystemType): CloudDefaults & { region: string; ssh_user: string } {
  const file = loadProviderConfig()[cloud] ?? {};
  const envRegion = cloud === "aws"
    ? process.env.AWS_REGION ?? process.env.AWS_DEFAULT_REGION
    : undefined;
  return {
    ...file,
    region: file.region ?? envRegion ?? BUILTIN_DEFAULTS[cloud].region,
    ssh_user: file.ssh_user ?? BUILTIN_DEFAULTS[cloud].ssh_user,
  };
}

/**
 * Throw AuthError when a cloud's required credential variables are absent.
 * AWS resolves credentials through the SDK chain and is checked with STS instead.
 */
export function assertCredentialsPresent(cloud: CloudSystemType, env: NodeJS.ProcessEnv = process.env): void {
  for (const group of REQUIRED_ENV[cloud]) {
    if (!group.some((name) => env[name])) {
      throw new AuthError(cloud, "missing_credentials",
        `${cloud}: set one of ${group.join(", ")} before running`);
    }
  }
}
