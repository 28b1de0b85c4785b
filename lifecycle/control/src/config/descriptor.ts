// config/descriptor.ts - Host Descriptor Grammar
//
//   descriptor := instance location? (":" group ("&" group)*)?
//   location   := "[" kv ("&" kv)* "]"
//   group      := name (";" kv)*
//   kv         := key "=" value
//
// e.g. m5.xlarge[region=us-east-1&zone=us-east-1a]:Disks;number=2;size=100;type=gp3&Networks;number=1

import { DescriptorParseError } from "@zathras/contracts";

// =============================================================================
// Types
// =============================================================================

export interface DiskSpec {
  kind: "disks";
  count: number;
  /** GiB per disk */
  size: number;
  type: string;
  iops: number | null;
  throughput: number | null;
}

export type NetworkType = "public" | "private";

export interface NetworkSpec {
  kind: "networks";
  count: number;
  type: NetworkType;
}

export interface SysctlSpec {
  kind: "sysctl";
  profiles: string[];
}

export type DescriptorGroup = DiskSpec | NetworkSpec | SysctlSpec;

export interface HostDescriptor {
  /** Original string, passed through to test wrappers */
  raw: string;
  instanceType: string;
  region?: string;
  zone?: string;
  placement?: string;
  groups: DescriptorGroup[];
  /** Disk groups with count > 0 */
  disks: DiskSpec[];
  networks: NetworkSpec | null;
  sysctlProfiles: string[];
}

export interface ParseDescriptorOptions {
  /** Disk type used when a Disks group has no type key */
  defaultDiskType: string;
}

// =============================================================================
// Parser
// =============================================================================

interface KeyValue {
  key: string;
  value: string;
  /** Offset of the key in the source */
  at: number;
}

const GROUP_NAMES: Record<string, DescriptorGroup["kind"]> = {
  disks: "disks",
  networks: "networks",
  sysctl_settings: "sysctl",
};

class DescriptorCursor {
  pos = 0;

  constructor(readonly src: string) {}

  peek(): string | undefined {
    return this.src[this.pos];
  }

  atEnd(): boolean {
    return this.pos >= this.src.length;
  }

  eat(ch: string): boolean {
    if (this.src[this.pos] === ch) {
      this.pos++;
      return true;
    }
    return false;
  }

  /** Consume characters up to (not including) any stop character */
  takeUntil(stops: string): string {
    const start = this.pos;
    while (!this.atEnd() && !stops.includes(this.src[this.pos] ?? "")) this.pos++;
    return this.src.slice(start, this.pos);
  }

  fail(message: string, from: number, to = this.pos): never {
    const fragment = this.src.slice(from, Math.max(to, from + 1));
    throw new DescriptorParseError(message, fragment, from);
  }
}

function parseKeyValue(cur: DescriptorCursor, stops: string): KeyValue {
  const at = cur.pos;
  const key = cur.takeUntil("=" + stops);
  if (!cur.eat("=")) cur.fail("Expected key=value", at);
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) cur.fail("Invalid key", at);
  const value = cur.takeUntil(stops);
  if (value.length === 0) cur.fail(`Missing value for ${key}`, at);
  return { key, value, at };
}

function parseCount(cur: DescriptorCursor, kv: KeyValue): number {
  if (!/^\d+$/.test(kv.value)) {
    cur.fail(`Non-numeric value for ${kv.key}`, kv.at, kv.at + kv.key.length + 1 + kv.value.length);
  }
  return parseInt(kv.value, 10);
}

function buildDisks(cur: DescriptorCursor, pairs: KeyValue[], opts: ParseDescriptorOptions, at: number): DiskSpec {
  const disk: DiskSpec = {
    kind: "disks",
    count: 1,
    size: 0,
    type: opts.defaultDiskType,
    iops: null,
    throughput: null,
  };
  let sawSize = false;
  for (const kv of pairs) {
    switch (kv.key) {
      case "number":
        disk.count = parseCount(cur, kv);
        break;
      case "size":
        disk.size = parseCount(cur, kv);
        sawSize = true;
        break;
      case "type":
        disk.type = kv.value;
        break;
      case "iops":
        disk.iops = parseCount(cur, kv);
        break;
      case "tp":
      case "throughput":
        disk.throughput = parseCount(cur, kv);
        break;
      // unknown keys are ignored
    }
  }
  if (disk.count > 0 && !sawSize) cur.fail("Disks group requires size", at);
  return disk;
}

function buildNetworks(cur: DescriptorCursor, pairs: KeyValue[]): NetworkSpec {
  const net: NetworkSpec = { kind: "networks", count: 1, type: "public" };
  for (const kv of pairs) {
    if (kv.key === "number") {
      net.count = parseCount(cur, kv);
    } else if (kv.key === "type") {
      if (kv.value !== "public" && kv.value !== "private") {
        cur.fail("Network type must be public or private", kv.at, kv.at + 5 + kv.value.length);
      }
      net.type = kv.value;
    }
  }
  return net;
}

function buildSysctl(pairs: KeyValue[]): SysctlSpec {
  return {
    kind: "sysctl",
    profiles: pairs.filter((kv) => kv.key === "name").map((kv) => kv.value),
  };
}

function parseGroup(cur: DescriptorCursor, opts: ParseDescriptorOptions): DescriptorGroup {
  const at = cur.pos;
  const name = cur.takeUntil(";&");
  const kind = GROUP_NAMES[name.toLowerCase()];
  if (name.length === 0) cur.fail("Expected group name", at);
  if (!kind) cur.fail("Unknown descriptor group", at);

  const pairs: KeyValue[] = [];
  while (cur.eat(";")) {
    pairs.push(parseKeyValue(cur, ";&"));
  }

  switch (kind) {
    case "disks":
      return buildDisks(cur, pairs, opts, at);
    case "networks":
      return buildNetworks(cur, pairs);
    case "sysctl":
      return buildSysctl(pairs);
  }
}

/**
 * Parse a host descriptor into typed groups. Throws DescriptorParseError
 * naming the offending substring.
 */
export function parseHostDescriptor(src: string, opts: ParseDescriptorOptions): HostDescriptor {
  const cur = new DescriptorCursor(src.trim());
  const instanceType = cur.takeUntil("[:");
  if (instanceType.length === 0 || /\s/.test(instanceType)) {
    cur.fail("Invalid instance type", 0);
  }

  const descriptor: HostDescriptor = {
    raw: cur.src,
    instanceType,
    groups: [],
    disks: [],
    networks: null,
    sysctlProfiles: [],
  };

  if (cur.eat("[")) {
    do {
      const kv = parseKeyValue(cur, "&]");
      if (kv.key === "region") descriptor.region = kv.value;
      else if (kv.key === "zone") descriptor.zone = kv.value;
      else if (kv.key === "placement") descriptor.placement = kv.value;
    } while (cur.eat("&"));
    if (!cur.eat("]")) cur.fail("Unterminated location block", cur.pos);
  }

  if (cur.eat(":")) {
    do {
      descriptor.groups.push(parseGroup(cur, opts));
    } while (cur.eat("&"));
  }

  if (!cur.atEnd()) cur.fail("Unexpected input", cur.pos, cur.src.length);

  for (const group of descriptor.groups) {
    if (group.kind === "disks" && group.count > 0) descriptor.disks.push(group);
    else if (group.kind === "networks") descriptor.networks = group.count > 0 ? group : null;
    else if (group.kind === "sysctl") descriptor.sysctlProfiles.push(...group.profiles);
  }
  return descriptor;
}

/** Total number of extra disks across all disk groups */
export function totalDiskCount(descriptor: HostDescriptor): number {
  return descriptor.disks.reduce((n, d) => n + d.count, 0);
}
