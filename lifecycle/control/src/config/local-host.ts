// config/local-host.ts - Bare-Metal Host Configs
// One `<hostname>.config` file per host under local_config_dir:
//
//   storage: /dev/nvme1n1,/dev/nvme2n1
//   server_ips: 192.168.10.2
//   client_ips: 192.168.10.3,192.168.10.4

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { ConfigurationError } from "@zathras/contracts";

export interface LocalHostConfig {
  hostname: string;
  path: string;
  storage: string[];
  serverIps: string[];
  clientIps: string[];
  /** Any other key: value lines */
  extra: Record<string, string>;
}

function splitList(value: string): string[] {
  const items = value.split(/[,\s]+/).map((s) => s.trim()).filter(Boolean);
  return items.length === 1 && items[0] === "none" ? [] : items;
}

export function parseLocalHostConfig(text: string, hostname: string, path: string): LocalHostConfig {
  const config: LocalHostConfig = { hostname, path, storage: [], serverIps: [], clientIps: [], extra: {} };
  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? "").trim();
    if (!line || line.startsWith("#")) continue;
    const colon = line.indexOf(":");
    if (colon <= 0) {
      throw new ConfigurationError(`${path}:${i + 1}: expected "key: value", got "${line}"`);
    }
    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    switch (key) {
      case "storage":
        config.storage = splitList(value);
        break;
      case "server_ips":
        config.serverIps = splitList(value);
        break;
      case "client_ips":
        config.clientIps = splitList(value);
        break;
      default:
        config.extra[key] = value;
    }
  }
  return config;
}

export function localConfigPath(dir: string, hostname: string): string {
  return join(dir, `${hostname}.config`);
}

/** Load a host's config; a missing file is a configuration error */
export function loadLocalHostConfig(dir: string, hostname: string): LocalHostConfig {
  const path = localConfigPath(dir, hostname);
  if (!existsSync(path)) {
    throw new ConfigurationError(`Local host config ${path} not found for ${hostname}`, {
      code: "LOCAL_CONFIG_MISSING",
    });
  }
  return parseLocalHostConfig(readFileSync(path, "utf-8"), hostname, path);
}
