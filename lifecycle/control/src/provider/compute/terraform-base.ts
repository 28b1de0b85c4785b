// provider/compute/terraform-base.ts - Shared Terraform-Backed Provider
// AWS, Azure, GCP and IBM all render templates + env.tfvars into
// <workdir>/tf and drive the same init/workspace/plan/apply/output/destroy
// sequence. Subclasses choose templates, variables and failure classification.

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import type { CloudSystemType } from "@zathras/contracts";
import type {
  CloudProvider,
  ProviderCapabilities,
  ProvisionPlan,
  ProvisionRequest,
  ProvisionedResource,
} from "../types";
import { DEFAULT_DISK_TYPES, PROVIDER_CAPABILITIES } from "../types";
import {
  AuthError,
  ConcreteProviderError,
  SpotUnavailableError,
  type ProviderOperationError,
} from "../errors";
import { realExec, type ExecFunction, type ExecResult } from "../exec";
import type { DiskSpec } from "../../config/descriptor";
import {
  TEMPLATE_ROOT,
  TerraformRunner,
  copyTemplates,
  isFailedRun,
  outputString,
  outputStrings,
  summarize,
  terraformEnvFor,
  workspaceName,
  writeVarFile,
  type TfObject,
  type TfValue,
} from "../terraform";

// =============================================================================
// Config
// =============================================================================

export interface TerraformProviderConfig {
  /**
   * For tests only: inject a custom exec function.
   * When provided, ALL terraform calls use this function instead of spawning.
   */
  _execFactory?: ExecFunction;
  /** Override the template root (tests) */
  templateRoot?: string;
}

const AUTH_FAILURE = /AuthFailure|UnauthorizedOperation|InvalidClientTokenId|AuthorizationFailed|InvalidAuthenticationToken|Unauthenticated|status code: 401|PERMISSION_DENIED/;

// =============================================================================
// Base Provider
// =============================================================================

export abstract class TerraformProvider implements CloudProvider {
  abstract readonly name: CloudSystemType;
  protected readonly exec: ExecFunction;
  protected readonly templateRoot: string;

  constructor(config: TerraformProviderConfig = {}) {
    this.exec = config._execFactory ?? realExec;
    this.templateRoot = config.templateRoot ?? TEMPLATE_ROOT;
  }

  get capabilities(): ProviderCapabilities {
    return PROVIDER_CAPABILITIES[this.name];
  }

  get defaultDiskType(): string {
    return DEFAULT_DISK_TYPES[this.name];
  }

  protected get terraform(): TerraformRunner {
    return new TerraformRunner(this.name, this.exec, this.terraformEnv());
  }

  abstract preflight(): Promise<void>;

  /** Template files to copy for this request */
  protected abstract templateFiles(request: ProvisionRequest): string[];

  /** Variables written to env.tfvars */
  protected abstract variables(request: ProvisionRequest): Record<string, TfValue>;

  /** Extra environment for terraform (credentials, project) */
  protected terraformEnv(): Record<string, string> | undefined {
    return terraformEnvFor(this.name);
  }

  async plan(request: ProvisionRequest): Promise<ProvisionPlan> {
    const infraDir = join(request.workdir, "tf");
    mkdirSync(infraDir, { recursive: true });
    copyTemplates(this.name, this.templateFiles(request), infraDir, this.templateRoot);
    writeVarFile(infraDir, this.variables(request));

    const workspace = workspaceName(this.name, request.runLabel, request.system);
    const tf = this.terraform;
    await tf.init(infraDir);
    await tf.selectWorkspace(infraDir, workspace);
    await tf.plan(infraDir);
    return { request, infraDir, workspace };
  }

  async apply(plan: ProvisionPlan): Promise<void> {
    const dir = requireInfraDir(this.name, plan);
    const result = await this.terraform.apply(dir);
    if (isFailedRun(result)) throw this.classifyApplyFailure(plan, result);
  }

  async resolveAddress(plan: ProvisionPlan): Promise<ProvisionedResource | null> {
    const out = await this.terraform.output(requireInfraDir(this.name, plan));
    const publicIps = outputStrings(out, "public_ips");
    const privateIps = outputStrings(out, "private_ips");
    const hostname = outputString(out, "hostname") ?? publicIps[0] ?? null;
    if (!hostname) return null;
    return {
      hostname,
      instanceIds: outputStrings(out, "instance_ids"),
      publicIps,
      privateIps,
      zone: outputString(out, "zone") ?? undefined,
      spot: plan.request.spotPrice !== null,
    };
  }

  async destroy(plan: ProvisionPlan): Promise<void> {
    if (!plan.infraDir) return;
    await this.terraform.destroy(plan.infraDir);
  }

  /**
   * Map a failed apply to the taxonomy. While a spot price is in effect any
   * non-auth failure counts as the spot tier failing.
   */
  protected classifyApplyFailure(plan: ProvisionPlan, result: ExecResult): ProviderOperationError {
    const text = `${result.stdout}\n${result.stderr}`;
    if (AUTH_FAILURE.test(text)) {
      return new AuthError(this.name, "invalid_credentials", `${this.name}: ${summarize(result)}`);
    }
    const price = plan.request.spotPrice;
    if (price !== null) {
      return new SpotUnavailableError(this.name, price, `Spot create failed at ${price}: ${summarize(result)}`);
    }
    return new ConcreteProviderError(this.name, "INFRA_APPLY_FAILED",
      `terraform apply failed: ${summarize(result)}`,
      { details: { infraDir: plan.infraDir, exitCode: result.exitCode } }
    );
  }
}

export function requireInfraDir(provider: CloudSystemType, plan: ProvisionPlan): string {
  if (!plan.infraDir) {
    throw new ConcreteProviderError(provider, "INVALID_SPEC", `No infra directory for ${plan.request.system}`);
  }
  return plan.infraDir;
}

/** Common template variables derived from the request */
export function baseVariables(request: ProvisionRequest): Record<string, TfValue> {
  const d = request.descriptor;
  const vars: Record<string, TfValue> = {
    run_label: request.runLabel,
    system_name: request.system,
    vm_type: d.instanceType,
    ssh_user: request.sshUser,
    disks: expandDisks(d.disks),
    network_count: d.networks?.count ?? 0,
    network_public: (d.networks?.type ?? "public") === "public",
    tags: request.tags,
  };
  if (request.region) vars.region = request.region;
  if (request.zone) vars.zone = request.zone;
  if (request.osImage) vars.os_image = request.osImage;
  if (request.sshKeyFile) vars.ssh_public_key_file = `${request.sshKeyFile}.pub`;
  if (request.spotPrice !== null) vars.spot_price = request.spotPrice;
  return vars;
}

/** One entry per physical disk, in descriptor order */
export function expandDisks(groups: DiskSpec[]): TfObject[] {
  const disks: TfObject[] = [];
  for (const g of groups) {
    for (let i = 0; i < g.count; i++) {
      disks.push({ size: g.size, type: g.type, iops: g.iops ?? 0, throughput: g.throughput ?? 0 });
    }
  }
  return disks;
}

/** Template files shared by every provider layout */
export function commonTemplateFiles(request: ProvisionRequest): string[] {
  const files = ["main.tf", "variables.tf", "outputs.tf"];
  if (request.descriptor.disks.length > 0) files.push("disks.tf");
  if (request.descriptor.networks) files.push("network.tf");
  return files;
}
