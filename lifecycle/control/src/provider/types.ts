// provider/types.ts - Provider Interface & Type Definitions

import type { OsVendor, SystemLabel, SystemType } from "@zathras/contracts";
import type { HostDescriptor } from "../config/descriptor";

export type { SystemType };

// =============================================================================
// Provider Interface
// =============================================================================

/**
 * One implementation per system_type. The provisioning driver calls
 * plan -> apply -> resolveAddress (polled) -> finalize, and teardown calls
 * destroy with the same plan.
 */
export interface CloudProvider {
  readonly name: SystemType;
  readonly capabilities: ProviderCapabilities;
  /** Disk type used when a Disks group omits type */
  readonly defaultDiskType: string;

  /** Verify credentials and tooling are present. Throws before any resource exists. */
  preflight(): Promise<void>;

  /** Render templates and variables into the system's infra directory */
  plan(request: ProvisionRequest): Promise<ProvisionPlan>;

  /** Create resources. Throws a ProviderOperationError on failure. */
  apply(plan: ProvisionPlan): Promise<void>;

  /** Read back a routable address; null while none is available yet */
  resolveAddress(plan: ProvisionPlan): Promise<ProvisionedResource | null>;

  /** Post-create adjustments (tags, volume flags, network discovery) */
  finalize?(plan: ProvisionPlan, resource: ProvisionedResource): Promise<ProvisionedResource>;

  /** Destroy everything the plan created. Idempotent. */
  destroy(plan: ProvisionPlan): Promise<void>;

  /** True when the cloud reports the instance was reclaimed */
  checkInterrupted?(plan: ProvisionPlan, resource: ProvisionedResource): Promise<boolean>;
}

// =============================================================================
// Capability Flags
// =============================================================================

export interface ProviderCapabilities {
  spot: boolean;
  /** Resources live in a named resource group that may collide account-wide */
  resourceGroups: boolean;
  /** Whether resources are created (and so must be destroyed) */
  infrastructure: boolean;
}

export const PROVIDER_CAPABILITIES: Record<SystemType, ProviderCapabilities> = {
  aws: { spot: true, resourceGroups: false, infrastructure: true },
  azure: { spot: true, resourceGroups: true, infrastructure: true },
  gcp: { spot: true, resourceGroups: false, infrastructure: true },
  ibm: { spot: false, resourceGroups: false, infrastructure: true },
  local: { spot: false, resourceGroups: false, infrastructure: false },
};

export const DEFAULT_DISK_TYPES: Record<SystemType, string> = {
  aws: "gp2",
  azure: "Premium_LRS",
  gcp: "pd-standard",
  ibm: "general-purpose",
  local: "none",
};

// =============================================================================
// Provision Request, Plan & Resource
// =============================================================================

export interface ProvisionRequest {
  system: SystemLabel;
  runLabel: string;
  descriptor: HostDescriptor;
  osVendor: OsVendor;
  /** Image identifier (AMI, URN, image family); null lets the template choose */
  osImage: string | null;
  region: string | null;
  zone: string | null;
  sshKeyFile: string | null;
  sshUser: string;
  /** Max spot price for this attempt; null means on-demand */
  spotPrice: string | null;
  resourceGroup: string | null;
  tags: Record<string, string>;
  /** Per-system working directory */
  workdir: string;
  attempt: number;
}

export interface ProvisionPlan {
  request: ProvisionRequest;
  /** Directory holding templates, variables and state; null for local */
  infraDir: string | null;
  /** Infra-tool workspace name */
  workspace: string | null;
}

export interface ProvisionedResource {
  hostname: string;
  instanceIds: string[];
  publicIps: string[];
  privateIps: string[];
  vpcId?: string;
  securityGroupIds?: string[];
  zone?: string;
  spot: boolean;
}
