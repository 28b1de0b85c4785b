import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { emitError, emitOk } from './output/program';

// ─── Output Mode ─────────────────────────────────────────────────────────────

export type OutputMode = 'normal' | 'json' | 'quiet';
let currentOutputMode: OutputMode = 'normal';

export function setOutputMode(mode: OutputMode): void {
  currentOutputMode = mode;
}

export function getOutputMode(): OutputMode {
  return currentOutputMode;
}

/**
 * Output data respecting the current output mode.
 *
 *   json   → JSON envelope
 *   quiet  → nothing (exit code carries the outcome)
 *   normal → humanFormat()
 */
export function output(data: unknown, humanFormat?: () => void): void {
  const mode = getOutputMode();
  if (mode === 'json') {
    emitOk(data);
  } else if (mode === 'normal' && humanFormat) {
    humanFormat();
  }
}

/** Report a CLI-level error on stderr, or as an error envelope under --json. */
export function outputError(message: string): void {
  if (getOutputMode() === 'json') {
    emitError(message);
  } else {
    console.error(message);
  }
}

/**
 * Load a KEY=VALUE env file into process.env (lowest priority — won't overwrite existing vars).
 * Blank lines and lines starting with # are ignored. No shell expansion.
 */
export function loadEnvFile(filePath: string): void {
  if (!existsSync(filePath)) return;
  const content = readFileSync(filePath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    // Strip optional quotes
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

/** Path to the ~/.zathras directory (providers.yml, zathras.env). */
export const ZATHRAS_DIR = join(homedir(), '.zathras');

/** Print a table with padded columns. */
export function printTable(headers: string[], rows: string[][], widths: number[]): void {
  const fmt = (row: string[]) => row.map((v, i) => v.padEnd(widths[i] ?? 0)).join('  ');
  console.log(fmt(headers));
  console.log(widths.map(w => '-'.repeat(w)).join('  '));
  for (const row of rows) {
    console.log(fmt(row));
  }
}

/** Column widths that fit the header and every cell, capped at max. */
export function columnWidths(headers: string[], rows: string[][], max = 60): number[] {
  return headers.map((h, i) => Math.min(max, Math.max(h.length, ...rows.map(r => (r[i] ?? '').length))));
}
