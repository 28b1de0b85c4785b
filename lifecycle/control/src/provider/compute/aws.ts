// provider/compute/aws.ts - AWS Provider
// Terraform creates the instance; the EC2 SDK handles the adjustments
// terraform can't express cleanly (spot instance tags, delete-on-termination
// on attached volumes, network discovery, interruption detection).

import {
  EC2Client,
  DescribeInstancesCommand,
  CreateTagsCommand,
  ModifyInstanceAttributeCommand,
  type Instance as Ec2Instance,
} from "@aws-sdk/client-ec2";
import { STSClient, GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import type { ProvisionPlan, ProvisionRequest, ProvisionedResource } from "../types";
import { AuthError, ConcreteProviderError, withProviderErrorMapping } from "../errors";
import type { TfValue } from "../terraform";
import { getCloudDefaults } from "../config";
import {
  TerraformProvider,
  baseVariables,
  commonTemplateFiles,
  type TerraformProviderConfig,
} from "./terraform-base";

// =============================================================================
// Error Mapping
// =============================================================================

/**
 * Extract AWS error code from an SDK error. SDK v3 errors expose the code via
 * .name; some older shapes use Code or code.
 */
export function getAwsErrorCode(err: unknown): string {
  if (err && typeof err === "object") {
    for (const key of ["name", "Code", "code"]) {
      const v: unknown = Reflect.get(err, key);
      if (typeof v === "string" && v !== "Error") return v;
    }
  }
  return "Unknown";
}

/** Map AWS error codes to provider error taxonomy */
export function mapEC2Error(awsErrorCode: string, message: string): ConcreteProviderError {
  switch (awsErrorCode) {
    case "AuthFailure":
    case "UnauthorizedOperation":
    case "InvalidClientTokenId":
    case "ExpiredToken":
      return new ConcreteProviderError("aws", "AUTH_ERROR", message);
    case "RequestLimitExceeded":
    case "Throttling":
      return new ConcreteProviderError("aws", "RATE_LIMIT_ERROR", message, { retryable: true, retry_after_ms: 5000 });
    case "InvalidInstanceID.NotFound":
      return new ConcreteProviderError("aws", "NOT_FOUND", message);
    case "InvalidInstanceID.Malformed":
    case "InvalidParameterValue":
      return new ConcreteProviderError("aws", "INVALID_SPEC", message);
    default:
      return new ConcreteProviderError("aws", "PROVIDER_INTERNAL", message);
  }
}

function mapAwsError(err: unknown): ConcreteProviderError {
  return mapEC2Error(getAwsErrorCode(err), err instanceof Error ? err.message : String(err));
}

// =============================================================================
// SDK Facade
// =============================================================================

/** The EC2/STS calls this provider makes. Tests supply an in-memory fake. */
export interface AwsApi {
  describeInstances(instanceIds: string[]): Promise<Ec2Instance[]>;
  createTags(resourceIds: string[], tags: Record<string, string>): Promise<void>;
  setDeleteOnTermination(instanceId: string, deviceName: string): Promise<void>;
  callerArn(): Promise<string>;
}

export function createAwsApi(region: string): AwsApi {
  const ec2 = new EC2Client({ region });
  const sts = new STSClient({ region });
  return {
    async describeInstances(instanceIds) {
      const out = await ec2.send(new DescribeInstancesCommand({ InstanceIds: instanceIds }));
      return (out.Reservations ?? []).flatMap((r) => r.Instances ?? []);
    },
    async createTags(resourceIds, tags) {
      await ec2.send(new CreateTagsCommand({
        Resources: resourceIds,
        Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
      }));
    },
    async setDeleteOnTermination(instanceId, deviceName) {
      await ec2.send(new ModifyInstanceAttributeCommand({
        InstanceId: instanceId,
        BlockDeviceMappings: [{ DeviceName: deviceName, Ebs: { DeleteOnTermination: true } }],
      }));
    },
    async callerArn() {
      const out = await sts.send(new GetCallerIdentityCommand({}));
      return out.Arn ?? "";
    },
  };
}

// =============================================================================
// AWS Provider
// =============================================================================

export interface AWSProviderConfig extends TerraformProviderConfig {
  region?: string;
  /** For tests only: inject the SDK facade. */
  _apiFactory?: (region: string) => AwsApi;
}

const INTERRUPTED_STATES = new Set(["shutting-down", "terminated", "stopping", "stopped"]);

export class AWSProvider extends TerraformProvider {
  readonly name = "aws" as const;

  private readonly region: string;
  private readonly apiFactory: (region: string) => AwsApi;
  private apis = new Map<string, AwsApi>();
  /** IAM user name from STS, used for the User tag */
  private callerName: string | null = null;

  constructor(config: AWSProviderConfig = {}) {
    super(config);
    this.region = config.region ?? getCloudDefaults("aws").region;
    this.apiFactory = config._apiFactory ?? createAwsApi;
  }

  /** Get (or create and cache) the SDK facade for a region. EC2 is regional. */
  private api(region?: string | null): AwsApi {
    const r = region ?? this.region;
    let api = this.apis.get(r);
    if (!api) {
      api = this.apiFactory(r);
      this.apis.set(r, api);
    }
    return api;
  }

  /** Verify credentials with STS GetCallerIdentity */
  async preflight(): Promise<void> {
    try {
      const arn = await this.api().callerArn();
      this.callerName = arn.split("/").pop() || null;
    } catch (err) {
      const mapped = mapAwsError(err);
      throw new AuthError("aws", "invalid_credentials", `AWS credential check failed: ${mapped.message}`);
    }
  }

  protected templateFiles(request: ProvisionRequest): string[] {
    return [
      ...commonTemplateFiles(request),
      request.spotPrice !== null ? "instance_spot.tf" : "instance.tf",
    ];
  }

  protected variables(request: ProvisionRequest): Record<string, TfValue> {
    const vars = baseVariables(request);
    vars.region = request.region ?? this.region;
    vars.tags = this.tagsFor(request);
    if (request.zone) vars.zone = request.zone;
    if (request.descriptor.placement) vars.placement_group = request.descriptor.placement;
    return vars;
  }

  private tagsFor(request: ProvisionRequest): Record<string, string> {
    return {
      Name: `${request.runLabel}-${request.system}`,
      ...(this.callerName ? { User: this.callerName } : {}),
      ...request.tags,
    };
  }

  /**
   * Tag spot instances (spot request tags don't propagate), force
   * delete-on-termination on every attached volume, and record VPC,
   * security groups and zone.
   */
  async finalize(plan: ProvisionPlan, resource: ProvisionedResource): Promise<ProvisionedResource> {
    if (resource.instanceIds.length === 0) return resource;
    const api = this.api(plan.request.region);

    return withProviderErrorMapping("aws", async () => {
      if (resource.spot) {
        await api.createTags(resource.instanceIds, this.tagsFor(plan.request));
      }

      const instances = await api.describeInstances(resource.instanceIds);
      const root = new Set(instances.map((i) => i.RootDeviceName).filter(Boolean));
      for (const inst of instances) {
        for (const mapping of inst.BlockDeviceMappings ?? []) {
          if (!inst.InstanceId || !mapping.DeviceName || root.has(mapping.DeviceName)) continue;
          if (mapping.Ebs?.DeleteOnTermination === true) continue;
          await api.setDeleteOnTermination(inst.InstanceId, mapping.DeviceName);
        }
      }

      const first = instances[0];
      return {
        ...resource,
        vpcId: first?.VpcId ?? resource.vpcId,
        securityGroupIds: (first?.SecurityGroups ?? [])
          .map((g) => g.GroupId)
          .filter((id): id is string => typeof id === "string"),
        zone: first?.Placement?.AvailabilityZone ?? resource.zone,
      };
    }, mapAwsError);
  }

  /** True when EC2 reports the spot instance was reclaimed */
  async checkInterrupted(plan: ProvisionPlan, resource: ProvisionedResource): Promise<boolean> {
    if (!resource.spot || resource.instanceIds.length === 0) return false;
    const instances = await withProviderErrorMapping("aws",
      () => this.api(plan.request.region).describeInstances(resource.instanceIds), mapAwsError);
    return instances.some((i) =>
      INTERRUPTED_STATES.has(i.State?.Name ?? "") &&
      (i.StateReason?.Code ?? "").startsWith("Server.SpotInstance"));
  }
}

export function createAwsProvider(config?: AWSProviderConfig): AWSProvider {
  return new AWSProvider(config);
}

export default createAwsProvider;
