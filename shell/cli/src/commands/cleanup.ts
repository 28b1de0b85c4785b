// commands/cleanup.ts — zathras cleanup <results-dir> [--destroy [--dry-run]]
//
// Lists infra directories under a results tree that still hold live
// resources; --destroy tears them down one by one. With --dry-run each
// one is reported as it would be handled, and nothing is destroyed.

import {
  safeDestroyBatch,
  scanResultsTree,
  type DestroyResult,
  type ExecFunction,
  type OrphanRecord,
} from '@zathras/lifecycle';
import { columnWidths, output, outputError, printTable } from '../config';

function printCleanupUsage(): void {
  console.error('Usage: zathras cleanup <results-dir> [--destroy [--dry-run]]');
}

export function orphanRows(orphans: OrphanRecord[]): string[][] {
  return orphans.map(o => [o.dir, o.workspace, o.provider ?? '?', String(o.resourceCount)]);
}

export async function cleanupCommand(args: string[], exec?: ExecFunction): Promise<number> {
  let destroy = false;
  let dryRun = false;
  const positional: string[] = [];
  for (const arg of args) {
    if (arg === '--destroy') { destroy = true; }
    else if (arg === '--dry-run') { dryRun = true; }
    else if (arg === '-h' || arg === '--help') { printCleanupUsage(); return 0; }
    else if (arg.startsWith('-')) {
      outputError(`Unknown flag: ${arg}`);
      printCleanupUsage();
      return 2;
    } else { positional.push(arg); }
  }
  const root = positional[0];
  if (!root || positional.length > 1) {
    printCleanupUsage();
    return 2;
  }
  if (dryRun && !destroy) {
    outputError('--dry-run only applies with --destroy');
    printCleanupUsage();
    return 2;
  }

  const scan = scanResultsTree(root);
  if (!destroy) {
    output(scan.orphans, () => {
      if (scan.orphans.length === 0) {
        console.log(`No live resources under ${root}.`);
        return;
      }
      const headers = ['DIR', 'WORKSPACE', 'PROVIDER', 'RESOURCES'];
      const rows = orphanRows(scan.orphans);
      printTable(headers, rows, columnWidths(headers, rows, 80));
      console.log('');
      console.log(`Run \`zathras cleanup ${root} --destroy\` to destroy them.`);
    });
    return 0;
  }

  const results: DestroyResult[] = await safeDestroyBatch(scan.orphans.map(orphan => ({ orphan, dryRun })), exec);
  output(results, () => {
    for (const r of results) {
      console.log(`${r.action.padEnd(24)} ${r.dir} (${r.workspace})${r.reason ? `: ${r.reason}` : ''}`);
    }
  });
  return results.some(r => r.action === 'failed') ? 1 : 0;
}
