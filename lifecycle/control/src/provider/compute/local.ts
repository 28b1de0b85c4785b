// provider/compute/local.ts - Local (Bare-Metal) Provider
// The system already exists: the descriptor's instance name is its
// hostname. Nothing is created, so nothing is destroyed.

import type {
  CloudProvider,
  ProviderCapabilities,
  ProvisionPlan,
  ProvisionRequest,
  ProvisionedResource,
} from "../types";
import { DEFAULT_DISK_TYPES, PROVIDER_CAPABILITIES } from "../types";

export class LocalProvider implements CloudProvider {
  readonly name = "local" as const;
  readonly capabilities: ProviderCapabilities = PROVIDER_CAPABILITIES.local;
  readonly defaultDiskType = DEFAULT_DISK_TYPES.local;

  async preflight(): Promise<void> {}

  async plan(request: ProvisionRequest): Promise<ProvisionPlan> {
    return { request, infraDir: null, workspace: null };
  }

  async apply(_plan: ProvisionPlan): Promise<void> {}

  async resolveAddress(plan: ProvisionPlan): Promise<ProvisionedResource> {
    const host = plan.request.descriptor.instanceType;
    return {
      hostname: host,
      instanceIds: [host],
      publicIps: [],
      privateIps: [],
      spot: false,
    };
  }

  async destroy(_plan: ProvisionPlan): Promise<void> {}
}

export function createLocalProvider(): LocalProvider {
  return new LocalProvider();
}

export default createLocalProvider;
