// provider/compute/ibm.ts - IBM Cloud Provider
// Credentials reach terraform through terraformEnvFor("ibm").

import type { ProvisionRequest } from "../types";
import type { TfValue } from "../terraform";
import { assertCredentialsPresent, getCloudDefaults } from "../config";
import {
  TerraformProvider,
  baseVariables,
  commonTemplateFiles,
  type TerraformProviderConfig,
} from "./terraform-base";

export class IBMProvider extends TerraformProvider {
  readonly name = "ibm" as const;

  constructor(config: TerraformProviderConfig = {}) {
    super(config);
  }

  async preflight(): Promise<void> {
    assertCredentialsPresent("ibm");
  }

  protected templateFiles(request: ProvisionRequest): string[] {
    return commonTemplateFiles(request);
  }

  protected variables(request: ProvisionRequest): Record<string, TfValue> {
    const vars = baseVariables(request);
    const region = request.region ?? getCloudDefaults("ibm").region;
    vars.region = region;
    vars.zone = request.zone ?? `${region}-1`;
    delete vars.spot_price;
    return vars;
  }
}

export function createIbmProvider(config?: TerraformProviderConfig): IBMProvider {
  return new IBMProvider(config);
}

export default createIbmProvider;
