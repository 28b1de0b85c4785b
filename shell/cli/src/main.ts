// cli/src/main.ts — zathras command entry

import { join } from 'node:path';
import { runCommand } from './commands/run';
import { cleanupCommand } from './commands/cleanup';
import { loadEnvFile, setOutputMode, ZATHRAS_DIR } from './config';

/**
 * Extract --json and --quiet from the raw argv array.
 * Returns the remaining args with those flags stripped.
 */
export function parseGlobalFlags(args: string[]): { json: boolean; quiet: boolean; remainingArgs: string[] } {
  let json = false;
  let quiet = false;
  const remainingArgs: string[] = [];
  for (const arg of args) {
    if (arg === '--json') { json = true; }
    else if (arg === '--quiet') { quiet = true; }
    else { remainingArgs.push(arg); }
  }
  return { json, quiet, remainingArgs };
}

function printUsage(exitCode: number): number {
  const out = exitCode === 0 ? console.log : console.error;
  out('Usage: zathras <command> [options]');
  out('');
  out('Commands:');
  out('  run [options]                 Provision, install, test and tear down systems');
  out('  cleanup <dir> [--destroy]     List (or destroy) leftover infrastructure under a results tree');
  out('  help                          Show this help');
  out('');
  out('Global flags:');
  out('  --json                        Output as JSON ({ "status", "data" } envelope)');
  out('  --quiet                       No summary output; the exit code carries the outcome');
  out('');
  return exitCode;
}

export async function main(argv: string[]): Promise<number> {
  loadEnvFile(join(ZATHRAS_DIR, 'zathras.env'));

  const { json, quiet, remainingArgs: args } = parseGlobalFlags(argv);
  if (json) setOutputMode('json');
  else if (quiet) setOutputMode('quiet');

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case undefined:
    case '-h':
    case '--help':
    case 'help':
      return printUsage(command === undefined ? 2 : 0);
    case 'run':
      return runCommand(commandArgs);
    case 'cleanup':
      return cleanupCommand(commandArgs);
    default:
      console.error(`Unknown command: ${command}`);
      return printUsage(2);
  }
}
