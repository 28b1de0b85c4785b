// provider/registry.ts - Provider Registry & Dispatch

import type { SystemType } from "@zathras/contracts";
import type { CloudProvider } from "./types";

// =============================================================================
// Compute Provider Registry
// =============================================================================

export const providerRegistry = {
  aws: () => import("./compute/aws"),
  azure: () => import("./compute/azure"),
  gcp: () => import("./compute/gcp"),
  ibm: () => import("./compute/ibm"),
  local: () => import("./compute/local"),
} satisfies Record<SystemType, () => Promise<{ default: () => CloudProvider }>>;

// Provider cache to avoid repeated imports
const providerCache = new Map<SystemType, CloudProvider>();

// =============================================================================
// Runtime Access
// =============================================================================

export async function getProvider(name: SystemType): Promise<CloudProvider> {
  const cached = providerCache.get(name);
  if (cached) return cached;

  const module = await providerRegistry[name]();
  const provider = module.default();

  providerCache.set(name, provider);
  return provider;
}

/**
 * Register a provider instance directly, replacing the lazily loaded one.
 * Used by tests to install mock providers.
 */
export function registerProvider(provider: CloudProvider): void {
  providerCache.set(provider.name, provider);
}

/** Clear all cached and registered providers. Test-only. */
export function clearAllProviders(): void {
  providerCache.clear();
}
