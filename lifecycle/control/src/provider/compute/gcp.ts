// provider/compute/gcp.ts - GCP Provider

import type { ProvisionRequest } from "../types";
import type { TfValue } from "../terraform";
import { assertCredentialsPresent, getCloudDefaults } from "../config";
import {
  TerraformProvider,
  baseVariables,
  commonTemplateFiles,
  type TerraformProviderConfig,
} from "./terraform-base";

export class GCPProvider extends TerraformProvider {
  readonly name = "gcp" as const;

  constructor(config: TerraformProviderConfig = {}) {
    super(config);
  }

  async preflight(): Promise<void> {
    assertCredentialsPresent("gcp");
  }

  protected templateFiles(request: ProvisionRequest): string[] {
    return commonTemplateFiles(request);
  }

  protected variables(request: ProvisionRequest): Record<string, TfValue> {
    const defaults = getCloudDefaults("gcp");
    const vars = baseVariables(request);
    const region = request.region ?? defaults.region;
    vars.region = region;
    vars.zone = request.zone ?? defaults.zone ?? `${region}-a`;
    vars.project = process.env.GOOGLE_PROJECT ?? process.env.CLOUDSDK_CORE_PROJECT ?? "";
    // GCP spot VMs have no bid price; any spot tier maps to the SPOT model
    vars.provisioning_model = request.spotPrice !== null ? "SPOT" : "STANDARD";
    delete vars.spot_price;
    return vars;
  }
}

export function createGcpProvider(config?: TerraformProviderConfig): GCPProvider {
  return new GCPProvider(config);
}

export default createGcpProvider;
