// config/scenario.ts - Scenario & Scenario-Vars Files
//
//   global:
//     system_type: aws
//     tests: streams
//   systems:
//     system1:
//       host_config: m5.xlarge
//     barrier:
//       host_config: SYS_BARRIER
//     system2:
//       host_config: m6i.xlarge

import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "@zathras/contracts";

export const SYS_BARRIER = "SYS_BARRIER";

const OptionMapSchema = Type.Record(Type.String(), Type.Unknown());

const ScenarioFileSchema = Type.Object({
  global: Type.Optional(Type.Union([OptionMapSchema, Type.Null()])),
  systems: Type.Record(Type.String(), Type.Union([OptionMapSchema, Type.Null()])),
});

export interface ScenarioSystem {
  label: string;
  options: Record<string, unknown>;
}

export interface Scenario {
  path: string;
  global: Record<string, unknown>;
  /** Systems in declaration order, split at every barrier */
  groups: ScenarioSystem[][];
}

function readYaml(path: string, what: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${what} ${path}`, { cause: err });
  }
  try {
    return parseYaml(text);
  } catch (err) {
    throw new ConfigurationError(`${what} ${path} is not valid YAML`, { cause: err });
  }
}

function isBarrier(label: string, options: Record<string, unknown>): boolean {
  return label === SYS_BARRIER || options.host_config === SYS_BARRIER;
}

export function parseScenario(raw: unknown, path: string): Scenario {
  if (!Value.Check(ScenarioFileSchema, raw)) {
    const first = Value.Errors(ScenarioFileSchema, raw).First();
    throw new ConfigurationError(
      `Scenario ${path}: ${first ? `${first.path || "/"} ${first.message}` : "invalid"}; expected global and systems mappings`
    );
  }

  const groups: ScenarioSystem[][] = [[]];
  for (const [label, options] of Object.entries(raw.systems)) {
    const opts = options ?? {};
    if (isBarrier(label, opts)) {
      groups.push([]);
      continue;
    }
    groups[groups.length - 1]?.push({ label, options: opts });
  }
  const nonEmpty = groups.filter((g) => g.length > 0);
  if (nonEmpty.length === 0) {
    throw new ConfigurationError(`Scenario ${path} declares no systems`);
  }
  return { path, global: raw.global ?? {}, groups: nonEmpty };
}

export function loadScenario(path: string): Scenario {
  return parseScenario(readYaml(path, "scenario file"), path);
}

/** Scenario-vars: a flat option map */
export function loadScenarioVars(path: string): Record<string, unknown> {
  const raw = readYaml(path, "scenario vars file");
  if (raw === null || raw === undefined) return {};
  if (!Value.Check(OptionMapSchema, raw)) {
    throw new ConfigurationError(`Scenario vars ${path} must be a mapping of option: value`);
  }
  return raw;
}
