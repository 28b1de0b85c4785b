// provider/compute/azure.ts - Azure Provider
// Every system gets its own resource group. Group names are account-wide,
// so a leftover group from an earlier run collides; the retry controller
// then moves to the next numbered suffix.

import type { ExecResult } from "../exec";
import type { ProvisionPlan, ProvisionRequest } from "../types";
import { ResourceGroupConflictError, type ProviderOperationError } from "../errors";
import type { TfValue } from "../terraform";
import { assertCredentialsPresent, getCloudDefaults } from "../config";
import {
  TerraformProvider,
  baseVariables,
  commonTemplateFiles,
  type TerraformProviderConfig,
} from "./terraform-base";

const RG_CONFLICT = /ResourceGroupExists|resource group .* already exists|A resource with the ID "\/subscriptions\/[^"]*\/resourceGroups\/[^"/]*" already exists/i;

/** Default group name for a system */
export function defaultResourceGroup(runLabel: string, system: string): string {
  return `${runLabel}-${system}-rg`.replace(/[^A-Za-z0-9_.()-]/g, "-");
}

export class AzureProvider extends TerraformProvider {
  readonly name = "azure" as const;

  constructor(config: TerraformProviderConfig = {}) {
    super(config);
  }

  async preflight(): Promise<void> {
    assertCredentialsPresent("azure");
  }

  protected templateFiles(request: ProvisionRequest): string[] {
    return commonTemplateFiles(request);
  }

  protected variables(request: ProvisionRequest): Record<string, TfValue> {
    const vars = baseVariables(request);
    vars.region = request.region ?? getCloudDefaults("azure").region;
    vars.resource_group = request.resourceGroup ?? defaultResourceGroup(request.runLabel, request.system);
    vars.priority = request.spotPrice !== null ? "Spot" : "Regular";
    delete vars.spot_price;
    if (request.spotPrice !== null) vars.max_bid_price = Number(request.spotPrice);
    const subscription = process.env.ARM_SUBSCRIPTION_ID ?? process.env.AZURE_SUBSCRIPTION_ID;
    if (subscription) vars.subscription_id = subscription;
    return vars;
  }

  protected classifyApplyFailure(plan: ProvisionPlan, result: ExecResult): ProviderOperationError {
    const group = plan.request.resourceGroup ?? defaultResourceGroup(plan.request.runLabel, plan.request.system);
    if (RG_CONFLICT.test(`${result.stdout}\n${result.stderr}`)) {
      return new ResourceGroupConflictError("azure", group);
    }
    return super.classifyApplyFailure(plan, result);
  }
}

export function createAzureProvider(config?: TerraformProviderConfig): AzureProvider {
  return new AzureProvider(config);
}

export default createAzureProvider;
