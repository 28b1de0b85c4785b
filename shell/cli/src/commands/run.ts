// commands/run.ts — zathras run [--option value ...] [--scenario file] [--scenario_vars file]

import { ZathrasError, type SystemRunReport } from '@zathras/contracts';
import {
  OPTION_KINDS,
  OPTION_NAMES,
  ProviderOperationError,
  isOptionName,
  preflightSystems,
  resolveRun,
  runGroups,
  runSystem,
  type ResolvedRun,
  type SystemRunner,
} from '@zathras/lifecycle';
import { columnWidths, output, outputError, printTable } from '../config';

export interface ParsedRunArgs {
  /** Option values as typed on the command line; coerced by the resolver */
  cli: Record<string, string>;
  scenario?: string;
  scenarioVars?: string;
  help: boolean;
}

export type RunArgsResult = { ok: true; args: ParsedRunArgs } | { ok: false; error: string };

/** --system-type and --system_type name the same option */
function normalizeFlag(name: string): string {
  return name.replace(/-/g, '_');
}

/**
 * Parse flags from an argv-style array.
 *
 * Accepted forms: --key value, --key=value, and a bare --key for boolean
 * options (meaning yes). Positional arguments are rejected.
 */
export function parseRunArgs(args: string[]): RunArgsResult {
  const parsed: ParsedRunArgs = { cli: {}, help: false };

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';
    i++;
    if (arg === '-h' || arg === '--help') {
      parsed.help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      return { ok: false, error: `Unexpected argument: ${arg}` };
    }

    const eqIdx = arg.indexOf('=');
    const key = normalizeFlag(eqIdx === -1 ? arg.slice(2) : arg.slice(2, eqIdx));
    let value: string | undefined = eqIdx === -1 ? undefined : arg.slice(eqIdx + 1);

    const isBool = isOptionName(key) && OPTION_KINDS[key] === 'bool';
    if (value === undefined) {
      const next = args[i];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i++;
      } else if (isBool) {
        value = 'yes';
      } else {
        return { ok: false, error: `Flag --${key} needs a value` };
      }
    }

    if (key === 'scenario') {
      parsed.scenario = value;
    } else if (key === 'scenario_vars') {
      parsed.scenarioVars = value;
    } else if (isOptionName(key)) {
      parsed.cli[key] = value;
    } else {
      return { ok: false, error: `Unknown flag: --${key}` };
    }
  }
  return { ok: true, args: parsed };
}

function printRunUsage(): void {
  console.error('Usage: zathras run [options]');
  console.error('');
  console.error('  --scenario <file>        Scenario YAML (global + systems)');
  console.error('  --scenario_vars <file>   Flat YAML overriding scenario values');
  console.error('  --<option> <value>       Any run option; overrides both files');
  console.error('');
  console.error(`Options: ${OPTION_NAMES.join(', ')}`);
  console.error('');
  console.error('Examples:');
  console.error('  zathras run --system_type local --host_config test_sys --tests streams');
  console.error('  zathras run --scenario scenario.yml --spot_range 0.10,0.15');
}

// ─── Summary ─────────────────────────────────────────────────────────────────

export function summaryRows(reports: SystemRunReport[]): string[][] {
  return reports.map(r => {
    const passed = r.results.filter(t => t.status === 'PASS').length;
    return [
      r.system,
      r.status,
      r.failedStage ?? '-',
      String(r.attempts),
      `${passed}/${r.results.length}`,
      r.error ? `${r.error.code}: ${r.error.message}` : '',
    ];
  });
}

export function testRows(reports: SystemRunReport[]): string[][] {
  return reports.flatMap(r =>
    r.results.map(t => [r.system, t.test, t.pass, t.status, t.reportStatus ?? '-', `${t.durationSeconds}s`])
  );
}

function printSummary(reports: SystemRunReport[]): void {
  const headers = ['SYSTEM', 'STATUS', 'STAGE', 'ATTEMPTS', 'PASSED', 'ERROR'];
  const rows = summaryRows(reports);
  console.log('');
  printTable(headers, rows, columnWidths(headers, rows));

  const tHeaders = ['SYSTEM', 'TEST', 'PASS', 'STATUS', 'REPORT', 'TIME'];
  const tRows = testRows(reports);
  if (tRows.length > 0) {
    console.log('');
    printTable(tHeaders, tRows, columnWidths(tHeaders, tRows));
  }
}

// ─── Command ─────────────────────────────────────────────────────────────────

/**
 * Run command handler. Returns the process exit code:
 * 0 all systems succeeded, 1 a system failed, 2 usage or configuration error.
 * Missing or rejected credentials for any system type are a configuration
 * error found before the first group starts.
 */
export async function runCommand(
  args: string[],
  runner: SystemRunner = (c) => runSystem(c),
  preflight: (resolved: ResolvedRun) => Promise<void> = (r) => preflightSystems(r),
): Promise<number> {
  const parsed = parseRunArgs(args);
  if (!parsed.ok) {
    outputError(parsed.error);
    printRunUsage();
    return 2;
  }
  if (parsed.args.help) {
    printRunUsage();
    return 0;
  }

  let resolved: ResolvedRun;
  try {
    resolved = resolveRun({
      cli: parsed.args.cli,
      scenarioFile: parsed.args.scenario,
      scenarioVarsFile: parsed.args.scenarioVars,
    });
  } catch (err) {
    if (err instanceof ZathrasError && err.category === 'validation') {
      outputError(`Configuration error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  try {
    await preflight(resolved);
  } catch (err) {
    if (err instanceof ProviderOperationError && err.category === 'auth') {
      outputError(`Configuration error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  const systems = resolved.groups.reduce((n, g) => n + g.length, 0);
  console.log(`[run] ${systems} system(s) in ${resolved.groups.length} group(s), max ${resolved.maxSystems} at a time`);

  const reports = await runGroups(resolved, runner);
  output(reports, () => printSummary(reports));
  return reports.some(r => r.status === 'failed') ? 1 : 0;
}
