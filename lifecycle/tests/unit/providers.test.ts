// tests/unit/providers.test.ts - Terraform-backed providers against scripted commands

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import type { Instance } from "@aws-sdk/client-ec2";
import { parseHostDescriptor } from "../../control/src/config/descriptor";
import { AWSProvider, mapEC2Error, type AwsApi } from "../../control/src/provider/compute/aws";
import { AzureProvider } from "../../control/src/provider/compute/azure";
import { LocalProvider } from "../../control/src/provider/compute/local";
import {
  AuthError,
  ProviderOperationError,
  ResourceGroupConflictError,
  SpotUnavailableError,
} from "../../control/src/provider/errors";
import { getProvider, registerProvider } from "../../control/src/provider/registry";
import type { ProvisionPlan, ProvisionRequest } from "../../control/src/provider/types";
import { FakeExec, setupTest, type TestEnv } from "../harness";
import { makeMockProvider } from "../mock-provider";

let env: TestEnv;
beforeEach(() => { env = setupTest(); });
afterEach(() => env.cleanup());

function request(overrides: Partial<ProvisionRequest> = {}): ProvisionRequest {
  return {
    system: "system1",
    runLabel: "perf",
    descriptor: parseHostDescriptor("m5.xlarge:Disks;number=2;size=100;type=gp3", { defaultDiskType: "gp2" }),
    osVendor: "rhel",
    osImage: null,
    region: null,
    zone: null,
    sshKeyFile: null,
    sshUser: "ec2-user",
    spotPrice: null,
    resourceGroup: null,
    tags: { team: "perf" },
    workdir: env.dir,
    attempt: 1,
    ...overrides,
  };
}

interface FakeAws extends AwsApi {
  tagged: Array<{ ids: string[]; tags: Record<string, string> }>;
  deleteOnTermination: string[];
}

function fakeAws(instances: Instance[], arn = "arn:aws:iam::000000000000:user/perf-bot"): FakeAws {
  const api: FakeAws = {
    tagged: [],
    deleteOnTermination: [],
    async describeInstances() {
      return instances;
    },
    async createTags(ids, tags) {
      api.tagged.push({ ids, tags });
    },
    async setDeleteOnTermination(instanceId, deviceName) {
      api.deleteOnTermination.push(`${instanceId}:${deviceName}`);
    },
    async callerArn() {
      return arn;
    },
  };
  return api;
}

// =============================================================================
// AWS
// =============================================================================

describe("AWSProvider", () => {
  test("plan renders templates and variables, then init/workspace/plan", async () => {
    const exec = new FakeExec();
    const aws = new AWSProvider({ _execFactory: exec.exec, region: "us-east-1", _apiFactory: () => fakeAws([]) });

    const plan = await aws.plan(request({ spotPrice: "0.10" }));

    expect(plan.infraDir).toBe(join(env.dir, "tf"));
    expect(plan.workspace).toBe("aws-perf-system1");
    expect(readdirSync(join(env.dir, "tf")).sort()).toEqual([
      "disks.tf", "env.tfvars", "instance_spot.tf", "main.tf", "outputs.tf", "variables.tf",
    ]);
    const vars = readFileSync(join(env.dir, "tf", "env.tfvars"), "utf8");
    expect(vars).toContain('spot_price = "0.10"\n');
    expect(vars).toContain('region = "us-east-1"\n');
    expect(vars).toContain(
      'disks = [{ size = 100, type = "gp3", iops = 0, throughput = 0 }, { size = 100, type = "gp3", iops = 0, throughput = 0 }]\n'
    );
    expect(vars).toContain('tags = {\n  "Name" = "perf-system1"\n  "team" = "perf"\n}\n');
    expect(exec.lines()).toEqual([
      "terraform init -no-color -input=false",
      "terraform workspace select -no-color aws-perf-system1",
      "terraform plan -no-color -input=false -var-file=env.tfvars -out=plan.tfplan",
    ]);
  });

  test("on-demand uses the plain instance template", async () => {
    const aws = new AWSProvider({ _execFactory: new FakeExec().exec, region: "us-east-1", _apiFactory: () => fakeAws([]) });
    await aws.plan(request());
    expect(existsSync(join(env.dir, "tf", "instance.tf"))).toBe(true);
    expect(existsSync(join(env.dir, "tf", "instance_spot.tf"))).toBe(false);
  });

  test("preflight records the caller for the User tag", async () => {
    const aws = new AWSProvider({ _execFactory: new FakeExec().exec, region: "us-east-1", _apiFactory: () => fakeAws([]) });
    await aws.preflight();
    await aws.plan(request());
    expect(readFileSync(join(env.dir, "tf", "env.tfvars"), "utf8")).toContain(
      'tags = {\n  "Name" = "perf-system1"\n  "User" = "perf-bot"\n  "team" = "perf"\n}\n'
    );
  });

  test("preflight failure is an auth error", async () => {
    const api = fakeAws([]);
    api.callerArn = async () => {
      throw Object.assign(new Error("The security token included in the request is invalid"), { name: "InvalidClientTokenId" });
    };
    const aws = new AWSProvider({ region: "us-east-1", _apiFactory: () => api });
    await expect(aws.preflight()).rejects.toBeInstanceOf(AuthError);
  });

  test("apply failures are classified", async () => {
    const exec = new FakeExec();
    const aws = new AWSProvider({ _execFactory: exec.exec, region: "us-east-1", _apiFactory: () => fakeAws([]) });
    const spotPlan = await aws.plan(request({ spotPrice: "0.10" }));

    exec.on("terraform apply", { exitCode: 1, stderr: "Error: InsufficientInstanceCapacity" });
    await expect(aws.apply(spotPlan)).rejects.toBeInstanceOf(SpotUnavailableError);

    const onDemand: ProvisionPlan = { ...spotPlan, request: { ...spotPlan.request, spotPrice: null } };
    const err = await aws.apply(onDemand).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderOperationError);
    if (err instanceof ProviderOperationError) expect(err.code).toBe("INFRA_APPLY_FAILED");

    exec.on("terraform apply", { exitCode: 1, stderr: "Error: AuthFailure: credentials" });
    await expect(aws.apply(spotPlan)).rejects.toBeInstanceOf(AuthError);
  });

  test("resolveAddress reads terraform outputs", async () => {
    const exec = new FakeExec().on("terraform output", {
      stdout: JSON.stringify({
        public_ips: { value: ["198.51.100.7"] },
        private_ips: { value: ["10.0.1.5"] },
        instance_ids: { value: ["i-0abc"] },
      }),
    });
    const aws = new AWSProvider({ _execFactory: exec.exec, region: "us-east-1", _apiFactory: () => fakeAws([]) });
    const plan = await aws.plan(request({ spotPrice: "0.10" }));

    expect(await aws.resolveAddress(plan)).toEqual({
      hostname: "198.51.100.7",
      instanceIds: ["i-0abc"],
      publicIps: ["198.51.100.7"],
      privateIps: ["10.0.1.5"],
      spot: true,
    });
  });

  test("no address yet", async () => {
    const exec = new FakeExec().on("terraform output", { stdout: "{}" });
    const aws = new AWSProvider({ _execFactory: exec.exec, region: "us-east-1", _apiFactory: () => fakeAws([]) });
    const plan = await aws.plan(request());
    expect(await aws.resolveAddress(plan)).toBeNull();
  });

  test("finalize tags spot instances and sets delete-on-termination", async () => {
    const api = fakeAws([{
      InstanceId: "i-0abc",
      RootDeviceName: "/dev/xvda",
      BlockDeviceMappings: [
        { DeviceName: "/dev/xvda", Ebs: { DeleteOnTermination: true } },
        { DeviceName: "/dev/sdf", Ebs: { DeleteOnTermination: false } },
        { DeviceName: "/dev/sdg", Ebs: { DeleteOnTermination: true } },
      ],
      VpcId: "vpc-1",
      SecurityGroups: [{ GroupId: "sg-1" }],
      Placement: { AvailabilityZone: "us-east-1a" },
    }]);
    const aws = new AWSProvider({ _execFactory: new FakeExec().exec, region: "us-east-1", _apiFactory: () => api });
    const plan = await aws.plan(request({ spotPrice: "0.10" }));

    const resource = await aws.finalize(plan, {
      hostname: "198.51.100.7",
      instanceIds: ["i-0abc"],
      publicIps: ["198.51.100.7"],
      privateIps: [],
      spot: true,
    });

    expect(api.tagged).toEqual([{ ids: ["i-0abc"], tags: { Name: "perf-system1", team: "perf" } }]);
    expect(api.deleteOnTermination).toEqual(["i-0abc:/dev/sdf"]);
    expect(resource.vpcId).toBe("vpc-1");
    expect(resource.securityGroupIds).toEqual(["sg-1"]);
    expect(resource.zone).toBe("us-east-1a");
  });

  test("checkInterrupted recognises spot reclaim", async () => {
    const reclaimed = fakeAws([{
      InstanceId: "i-0abc",
      State: { Name: "terminated" },
      StateReason: { Code: "Server.SpotInstanceTermination", Message: "reclaimed" },
    }]);
    const aws = new AWSProvider({ _execFactory: new FakeExec().exec, region: "us-east-1", _apiFactory: () => reclaimed });
    const plan = await aws.plan(request({ spotPrice: "0.10" }));
    const resource = { hostname: "h", instanceIds: ["i-0abc"], publicIps: [], privateIps: [], spot: true };

    expect(await aws.checkInterrupted(plan, resource)).toBe(true);
    expect(await aws.checkInterrupted(plan, { ...resource, spot: false })).toBe(false);
  });

  test("EC2 error codes map to the taxonomy", () => {
    expect(mapEC2Error("RequestLimitExceeded", "slow down").code).toBe("RATE_LIMIT_ERROR");
    expect(mapEC2Error("InvalidInstanceID.NotFound", "gone").code).toBe("NOT_FOUND");
    expect(mapEC2Error("SomethingElse", "?").code).toBe("PROVIDER_INTERNAL");
  });
});

// =============================================================================
// Azure
// =============================================================================

describe("AzureProvider", () => {
  test("spot priority and bid price replace spot_price", async () => {
    const azure = new AzureProvider({ _execFactory: new FakeExec().exec });
    await azure.plan(request({ spotPrice: "0.25", resourceGroup: "perf-system1-rg-2" }));

    const vars = readFileSync(join(env.dir, "tf", "env.tfvars"), "utf8");
    expect(vars).toContain('priority = "Spot"\n');
    expect(vars).toContain("max_bid_price = 0.25\n");
    expect(vars).toContain('resource_group = "perf-system1-rg-2"\n');
    expect(vars).toContain('region = "eastus"\n');
    expect(vars).not.toContain("spot_price");
  });

  test("an existing resource group is a conflict", async () => {
    const exec = new FakeExec().on("terraform apply", {
      exitCode: 1,
      stderr: 'Error: A resource with the ID "/subscriptions/0000/resourceGroups/perf-system1-rg" already exists',
    });
    const azure = new AzureProvider({ _execFactory: exec.exec });
    const plan = await azure.plan(request({ resourceGroup: "perf-system1-rg" }));

    const err = await azure.apply(plan).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ResourceGroupConflictError);
    if (err instanceof ResourceGroupConflictError) expect(err.resourceGroup).toBe("perf-system1-rg");
  });
});

// =============================================================================
// Local & Registry
// =============================================================================

describe("LocalProvider", () => {
  test("the descriptor names the host; nothing is created", async () => {
    const local = new LocalProvider();
    const plan = await local.plan(request({ descriptor: parseHostDescriptor("bench01", { defaultDiskType: "none" }) }));
    expect(plan.infraDir).toBeNull();
    expect(await local.resolveAddress(plan)).toEqual({
      hostname: "bench01",
      instanceIds: ["bench01"],
      publicIps: [],
      privateIps: [],
      spot: false,
    });
    expect(local.capabilities.infrastructure).toBe(false);
  });
});

describe("provider registry", () => {
  test("lazy loads by system type and caches", async () => {
    const first = await getProvider("local");
    expect(first.name).toBe("local");
    expect(await getProvider("local")).toBe(first);
  });

  test("registered providers replace the lazy one", async () => {
    const mock = makeMockProvider({ name: "gcp" });
    registerProvider(mock);
    expect(await getProvider("gcp")).toBe(mock);
  });
});
