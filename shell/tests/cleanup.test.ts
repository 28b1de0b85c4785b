// shell/tests/cleanup.test.ts
//
// `zathras cleanup` over a temporary results tree with a scripted exec.

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { ExecFunction } from '@zathras/lifecycle';
import { cleanupCommand, orphanRows } from '../cli/src/commands/cleanup';
import { setOutputMode } from '../cli/src/config';

let dir: string;

function put(rel: string, content: string): void {
  const path = join(dir, rel);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

/** Records commands; terraform destroy answers with the given exit code */
function scriptedExec(destroyExit: number, calls: string[]): ExecFunction {
  return async (command) => {
    const line = command.join(' ');
    calls.push(line);
    const failed = line.startsWith('terraform destroy') && destroyExit !== 0;
    return { stdout: '', stderr: failed ? 'Error: DependencyViolation' : '', exitCode: failed ? destroyExit : 0 };
  };
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'zathras-cleanup-'));
  put('run1/sys1/tf/terraform.tfstate.d/aws-perf-sys1/terraform.tfstate', JSON.stringify({ resources: [{}, {}] }));
  put('run1/sys1/tf/env.tfvars', 'vm_type = "m5.xlarge"\n');
  setOutputMode('quiet');
});

afterEach(() => {
  setOutputMode('normal');
  rmSync(dir, { recursive: true, force: true });
});

describe('cleanupCommand', () => {
  test('lists without destroying', async () => {
    const calls: string[] = [];
    expect(await cleanupCommand([dir], scriptedExec(0, calls))).toBe(0);
    expect(calls).toEqual([]);
  });

  test('--destroy tears down each orphan', async () => {
    const calls: string[] = [];
    expect(await cleanupCommand([dir, '--destroy'], scriptedExec(0, calls))).toBe(0);
    expect(calls).toEqual([
      'terraform init -no-color -input=false',
      'terraform workspace select -no-color aws-perf-sys1',
      'terraform destroy -no-color -input=false -auto-approve -var-file=env.tfvars',
    ]);
  });

  test('--dry-run reports without running terraform', async () => {
    const calls: string[] = [];
    expect(await cleanupCommand([dir, '--destroy', '--dry-run'], scriptedExec(0, calls))).toBe(0);
    expect(calls).toEqual([]);
  });

  test('an ibm orphan is destroyed with the forwarded api key', async () => {
    put('run2/sys9/tf/terraform.tfstate.d/ibm-perf-sys9/terraform.tfstate', JSON.stringify({ resources: [{}] }));
    put('run2/sys9/tf/env.tfvars', 'vm_type = "bx2-4x16"\n');
    const saved = { IC_API_KEY: process.env.IC_API_KEY, IBMCLOUD_API_KEY: process.env.IBMCLOUD_API_KEY };
    delete process.env.IC_API_KEY;
    process.env.IBMCLOUD_API_KEY = 'test-secret';
    const envs = new Map<string, Record<string, string> | undefined>();
    const exec: ExecFunction = async (command, options) => {
      if (command[1] === 'destroy') envs.set(options?.cwd ?? '', options?.env);
      return { stdout: '', stderr: '', exitCode: 0 };
    };
    try {
      expect(await cleanupCommand([dir, '--destroy'], exec)).toBe(0);
    } finally {
      for (const [name, value] of Object.entries(saved)) {
        if (value === undefined) delete process.env[name];
        else process.env[name] = value;
      }
    }
    expect(envs.get(join(dir, 'run2/sys9/tf'))).toEqual({ IC_API_KEY: 'test-secret' });
    expect(envs.has(join(dir, 'run1/sys1/tf'))).toBe(true);
    expect(envs.get(join(dir, 'run1/sys1/tf'))).toBeUndefined();
  });

  test('a failed destroy exits 1', async () => {
    expect(await cleanupCommand([dir, '--destroy'], scriptedExec(1, []))).toBe(1);
  });

  test('usage errors exit 2', async () => {
    expect(await cleanupCommand([])).toBe(2);
    expect(await cleanupCommand([dir, '--force'])).toBe(2);
    expect(await cleanupCommand([dir, dir])).toBe(2);
    expect(await cleanupCommand([dir, '--dry-run'])).toBe(2);
  });

  test('rows', () => {
    expect(orphanRows([{ dir: '/r/tf', workspace: 'default', provider: null, resourceCount: 3, destroyable: false }]))
      .toEqual([['/r/tf', 'default', '?', '3']]);
  });
});
