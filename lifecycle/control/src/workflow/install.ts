// workflow/install.ts - Install / Configuration Stage
// Ordered steps against a reachable system. Each step yields
// success | failed | ignore and leaves a <step>.status marker.

import { existsSync } from "node:fs";
import { appendFile } from "node:fs/promises";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { InstallError, TIMING, errorMessage } from "@zathras/contracts";
import type { OsVendor, StepStatus } from "@zathras/contracts";
import { totalDiskCount } from "../config/descriptor";
import type { TuningPass } from "../config/resolver";
import { isConnectionFailure } from "../provider/errors";
import { shellQuote, type SshSession } from "../provider/ssh";
import type { RunContext } from "./context";
import { fileLock } from "./semaphore";

// =============================================================================
// Vendor Commands
// =============================================================================

export function repoCommands(vendor: OsVendor): string[] {
  switch (vendor) {
    case "rhel":
      return [
        "sudo dnf install -y https://dl.fedoraproject.org/pub/epel/epel-release-latest-$(rpm -E %rhel).noarch.rpm || rpm -q epel-release",
        "sudo dnf config-manager --set-enabled codeready-builder-for-rhel-$(rpm -E %rhel)-rhui-rpms || sudo subscription-manager repos --enable codeready-builder-for-rhel-$(rpm -E %rhel)-$(arch)-rpms",
      ];
    case "ubuntu":
      return ["sudo add-apt-repository -y universe", "sudo apt-get update"];
    case "amazon":
      return ["sudo yum-config-manager --enable epel || sudo amazon-linux-extras install -y epel"];
  }
}

export function updateCommand(vendor: OsVendor): string {
  switch (vendor) {
    case "rhel":
      return "sudo dnf -y update";
    case "ubuntu":
      return "sudo apt-get update && sudo DEBIAN_FRONTEND=noninteractive apt-get -y upgrade";
    case "amazon":
      return "sudo yum -y update";
  }
}

export function installCommand(vendor: OsVendor, packages: readonly string[]): string {
  const list = packages.map(shellQuote).join(" ");
  switch (vendor) {
    case "rhel":
      return `sudo dnf install -y ${list}`;
    case "ubuntu":
      return `sudo DEBIAN_FRONTEND=noninteractive apt-get install -y ${list}`;
    case "amazon":
      return `sudo yum install -y ${list}`;
  }
}

/** Exits 0 when no package manager holds its lock */
export function lockFreeCommand(vendor: OsVendor): string {
  return vendor === "ubuntu"
    ? "! sudo fuser /var/lib/dpkg/lock-frontend /var/lib/apt/lists/lock >/dev/null 2>&1"
    : "! pgrep -x 'dnf|yum' >/dev/null";
}

// =============================================================================
// Storage Discovery
// =============================================================================

interface LsblkDevice {
  name: string;
  type: string;
  mountpoint?: string | null;
  children?: LsblkDevice[];
}

const LsblkDeviceSchema = Type.Recursive((Self) =>
  Type.Object({
    name: Type.String(),
    type: Type.String(),
    mountpoint: Type.Optional(Type.Union([Type.String(), Type.Null()])),
    children: Type.Optional(Type.Array(Self)),
  })
);

const LsblkSchema = Type.Object({ blockdevices: Type.Array(LsblkDeviceSchema) });

type LsblkOutput = Static<typeof LsblkSchema>;

/** Whole disks with no partitions and no mount: free for benchmarks */
export function parseLsblk(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  if (!Value.Check(LsblkSchema, parsed)) {
    throw new InstallError("storage", "Unexpected lsblk output");
  }
  const out: LsblkOutput = parsed;
  const devices: LsblkDevice[] = out.blockdevices;
  return devices
    .filter((d) => d.type === "disk" && !d.mountpoint && (d.children ?? []).length === 0)
    .map((d) => d.name);
}

// =============================================================================
// Step Runner
// =============================================================================

async function appendInstallLog(ctx: RunContext, step: string, status: StepStatus): Promise<void> {
  const line = `${new Date(ctx.deps.now()).toISOString()} ${ctx.system} ${step} ${status}\n`;
  await fileLock.withPermit(() => appendFile(join(ctx.runDir, "install.log"), line));
}

/**
 * Run one step and record its marker. A connection loss always
 * propagates; other failures raise InstallError when the step is
 * required and are logged otherwise.
 */
export async function runStep(
  ctx: RunContext,
  name: string,
  required: boolean,
  fn: () => Promise<StepStatus>
): Promise<StepStatus> {
  let status: StepStatus;
  let failure: { error: unknown } | null = null;
  try {
    status = await fn();
  } catch (error) {
    status = "failed";
    failure = { error };
  }

  ctx.markers.stepStatus(name, status);
  await appendInstallLog(ctx, name, status);

  if (!failure) {
    ctx.log("install", `${name}: ${status}`);
    return status;
  }
  const { error } = failure;
  if (isConnectionFailure(error)) throw error;
  if (required) {
    throw error instanceof InstallError
      ? error
      : new InstallError(name, `${name} failed: ${errorMessage(error)}`, { cause: error });
  }
  ctx.warn("install", `${name} failed (ignored): ${errorMessage(error)}`);
  return status;
}

// =============================================================================
// Steps
// =============================================================================

export function collectPackages(ctx: RunContext): string[] {
  const vendor = ctx.config.options.os_vendor;
  const all = [...ctx.config.options.packages, ...ctx.remainingTests.flatMap((t) => t.packages[vendor])];
  return [...new Set(all)];
}

export async function waitForPackageLock(ctx: RunContext, ssh: SshSession): Promise<void> {
  const vendor = ctx.config.options.os_vendor;
  for (let attempt = 1; attempt <= TIMING.PKG_LOCK_RETRIES; attempt++) {
    const result = await ssh.run(lockFreeCommand(vendor));
    if (result.exitCode === 0) return;
    ctx.log("install", `package manager busy, waiting (${attempt}/${TIMING.PKG_LOCK_RETRIES})`);
    await ctx.deps.sleep(TIMING.PKG_LOCK_BASE_DELAY_MS * attempt);
  }
  throw new InstallError("packages", `package manager lock still held after ${TIMING.PKG_LOCK_RETRIES} checks`);
}

function needsPbench(ctx: RunContext): boolean {
  return ctx.config.options.pbench_install || ctx.remainingTests.some((t) => t.pbenchRequired);
}

type SelinuxMode = "disabled" | "enforcing" | "permissive";

export function desiredSelinux(state: "enabled" | "disabled" | "none", level: "enforcing" | "permissive"): SelinuxMode | null {
  if (state === "none") return null;
  return state === "disabled" ? "disabled" : level;
}

async function stepRepos(ctx: RunContext, ssh: SshSession): Promise<StepStatus> {
  if (ctx.config.options.do_not_install_packages) return "ignore";
  for (const cmd of repoCommands(ctx.config.options.os_vendor)) {
    await ssh.check(cmd, { timeout: TIMING.PACKAGE_INSTALL_TIMEOUT_MS });
  }
  return "success";
}

async function stepOsUpdate(ctx: RunContext, ssh: SshSession): Promise<StepStatus> {
  if (!ctx.config.options.os_update) return "ignore";
  await waitForPackageLock(ctx, ssh);
  await ssh.check(updateCommand(ctx.config.options.os_vendor), { timeout: TIMING.PACKAGE_INSTALL_TIMEOUT_MS });
  await ssh.reboot();
  return "success";
}

async function stepPackages(ctx: RunContext, ssh: SshSession): Promise<StepStatus> {
  if (ctx.config.options.do_not_install_packages) return "ignore";
  const packages = collectPackages(ctx);
  if (packages.length === 0) return "ignore";
  await waitForPackageLock(ctx, ssh);
  await ssh.check(installCommand(ctx.config.options.os_vendor, packages), {
    timeout: TIMING.PACKAGE_INSTALL_TIMEOUT_MS,
  });
  return "success";
}

async function stepPbench(ctx: RunContext, ssh: SshSession): Promise<StepStatus> {
  if (!needsPbench(ctx)) return "ignore";
  const vendor = ctx.config.options.os_vendor;
  if (vendor === "ubuntu") throw new InstallError("pbench", "pbench is not packaged for ubuntu");
  await waitForPackageLock(ctx, ssh);
  await ssh.check(installCommand(vendor, ["pbench-agent"]), { timeout: TIMING.PACKAGE_INSTALL_TIMEOUT_MS });
  await ssh.check("sudo bash -lc 'pbench-register-tool-set --label=default'");
  return "success";
}

async function stepSelinux(ctx: RunContext, ssh: SshSession): Promise<StepStatus> {
  const { selinux_state, selinux_level, os_vendor } = ctx.config.options;
  const desired = desiredSelinux(selinux_state, selinux_level);
  if (!desired) return "ignore";
  if (os_vendor === "ubuntu") throw new InstallError("selinux", "SELinux changes are not supported on ubuntu");

  const current = (await ssh.check("getenforce")).trim().toLowerCase();
  if (current === desired) return "success";

  await ssh.check(`sudo sed -i 's/^SELINUX=.*/SELINUX=${desired}/' /etc/selinux/config`);
  if (current === "disabled" || desired === "disabled") {
    await ssh.check(`sudo grubby --update-kernel ALL --args selinux=${desired === "disabled" ? 0 : 1}`);
  }
  ctx.log("install", `SELinux ${current} -> ${desired}, rebooting`);
  await ssh.reboot();
  return "success";
}

async function stepUploads(ctx: RunContext, ssh: SshSession): Promise<StepStatus> {
  const files = [...new Set([...ctx.config.options.upload_extra, ...ctx.remainingTests.flatMap((t) => t.uploadExtra)])];
  if (files.length === 0) return "ignore";
  for (const file of files) {
    if (!existsSync(file)) throw new InstallError("upload", `upload_extra file ${file} not found`);
    await ssh.copyTo(file, `${ctx.remoteHome}/`);
  }
  return "success";
}

async function stepStorage(ctx: RunContext, ssh: SshSession): Promise<StepStatus> {
  if (ctx.config.localHost || ctx.config.descriptor.disks.length === 0) return "ignore";
  const devices = parseLsblk(await ssh.check("lsblk -J -p -o NAME,TYPE,MOUNTPOINT"));
  const expected = totalDiskCount(ctx.config.descriptor);
  if (devices.length < expected) {
    ctx.warn("install", `found ${devices.length} unused disks, descriptor asked for ${expected}`);
  }
  if (devices.length === 0) throw new InstallError("storage", "no unused disks found");
  ctx.storageDevices = devices;
  return "success";
}

interface InstallStep {
  name: string;
  required(ctx: RunContext): boolean;
  run(ctx: RunContext, ssh: SshSession): Promise<StepStatus>;
}

export const INSTALL_STEPS: readonly InstallStep[] = [
  { name: "repos", required: (ctx) => ctx.config.options.error_repo_errors, run: stepRepos },
  { name: "os_update", required: () => true, run: stepOsUpdate },
  { name: "packages", required: (ctx) => ctx.config.options.error_repo_errors, run: stepPackages },
  { name: "pbench", required: () => true, run: stepPbench },
  { name: "selinux", required: () => true, run: stepSelinux },
  { name: "upload", required: () => true, run: stepUploads },
  { name: "storage", required: (ctx) => ctx.remainingTests.some((t) => t.storageRequired), run: stepStorage },
];

export async function runInstall(ctx: RunContext): Promise<Record<string, StepStatus>> {
  const ssh = ctx.ssh();
  ctx.addToGroup("install", ssh.target.host);
  const statuses: Record<string, StepStatus> = {};
  for (const step of INSTALL_STEPS) {
    statuses[step.name] = await runStep(ctx, step.name, step.required(ctx), () => step.run(ctx, ssh));
  }
  return statuses;
}

// =============================================================================
// Tuning Passes
// =============================================================================

/** Apply the pass's sysctl profile and tuned profile before its tests */
export async function applyTuningPass(ctx: RunContext, pass: TuningPass): Promise<void> {
  const ssh = ctx.ssh();

  await runStep(ctx, "sysctl", true, async () => {
    if (!pass.sysctl) return "ignore";
    const file = join(ctx.config.configDir, "sysctl", pass.sysctl);
    if (!existsSync(file)) throw new InstallError("sysctl", `sysctl profile ${file} not found`);
    const remote = `/tmp/${pass.sysctl}.conf`;
    await ssh.copyTo(file, remote);
    await ssh.check(`sudo cp ${shellQuote(remote)} ${shellQuote(`/etc/sysctl.d/99-${pass.sysctl}.conf`)} && sudo sysctl --system`);
    return "success";
  });

  await runStep(ctx, "tuned", false, async () => {
    if (!pass.tuned) return "ignore";
    await ssh.check("sudo systemctl enable --now tuned");
    await ssh.check(`sudo tuned-adm profile ${shellQuote(pass.tuned)}`);
    if (ctx.config.options.tuned_reboot) await ssh.reboot();
    return "success";
  });
}
