import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { LaunchResult } from '@gcmrun/core';
import { RunLifecycleController } from '@gcmrun/workflows';
import { createProgram } from '../../src/program.js';
import { ScriptedLauncher, silentLogger } from '../helpers/fake-launcher.js';

const EXPERIMENT_YAML = [
  'name: exp',
  'namelist:',
  '  main_nml:',
  '    days: 30',
  'diagTable:',
  '  files:',
  '    - { name: daily, frequency: 1, unit: days }',
  '  fields:',
  '    - { module: dynamics, name: ps }',
  '',
].join('\n');

describe('experiment commands', () => {
  let root: string;
  let configPath: string;
  let lines: string[];
  let exitCodes: number[];

  const env = (): NodeJS.ProcessEnv => ({
    GCM_BASE: join(root, 'base'),
    GCM_WORK: join(root, 'work'),
    GCM_DATA: join(root, 'data'),
    GCM_ENV: 'test',
  });

  const run = async (args: string[], result?: LaunchResult): Promise<ScriptedLauncher> => {
    const launcher = new ScriptedLauncher(result);
    const controller = new RunLifecycleController({
      launcher,
      logger: silentLogger,
      clock: { nowMs: () => 0 },
    });
    const program = createProgram({
      env: env(),
      controller,
      print: (line) => lines.push(line),
      setExitCode: (code) => exitCodes.push(code),
    });
    await program.parseAsync(['node', 'gcmrun', ...args]);
    return launcher;
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'gcmrun-cli-'));
    configPath = join(root, 'exp.yaml');
    writeFileSync(configPath, EXPERIMENT_YAML);
    lines = [];
    exitCodes = [];
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(root, { recursive: true, force: true });
  });

  it('renders the namelist and diag table', async () => {
    const out = join(root, 'rendered');

    await run(['render', configPath, out]);

    expect(readFileSync(join(out, 'input.nml'), 'utf8')).toBe('&main_nml\n    days = 30\n/\n');
    expect(readFileSync(join(out, 'diag_table'), 'utf8').split('\n')).toEqual([
      '"exp"',
      '0001 1 1 0 0 0',
      '',
      '#output files',
      '"daily", 1, "days", 1, "days", "time",',
      '',
      '#diagnostic field entries',
      '"dynamics", "ps", "ps", "daily", "all", .false., "none", 2,',
      '',
    ]);
    expect(lines).toEqual([`Wrote input.nml and diag_table to ${out}`]);
  });

  it('runs a cold first month', async () => {
    const launcher = await run(['run', configPath, '--month', '1', '--cold', '--cores', '4']);

    const outputDir = join(root, 'data', 'exp', 'run001');
    expect(lines).toEqual([`exp month 1: completed (through 30 days) -> ${outputDir}`]);
    expect(launcher.requests[0]?.args.slice(0, 2)).toEqual(['-np', '4']);
    expect(existsSync(join(root, 'work', 'exp', 'restarts', 'res_1.tar'))).toBe(true);
    expect(exitCodes).toEqual([]);
  });

  it('refuses to restart month 1', async () => {
    await expect(run(['run', configPath, '--month', '1'])).rejects.toThrow(
      'Month 1 has no previous month to restart from; run it cold'
    );
  });

  it('exits with 130 when the run is interrupted', async () => {
    await run(['run', configPath, '--month', '1', '--cold'], { status: 'cancelled' });

    expect(lines).toEqual(['exp month 1: interrupted']);
    expect(exitCodes).toEqual([130]);
  });

  it('chains months from a cold start', async () => {
    const launcher = await run(['chain', configPath, '--months', '2']);

    expect(launcher.requests.map((request) => request.env.GCM_RESTART_FILE)).toEqual([
      '',
      join(root, 'work', 'exp', 'restarts', 'res_1.tar'),
    ]);
    expect(lines).toHaveLength(2);
    expect(lines[1]).toMatch(/^exp month 2: completed/);
  });

  it('passes multi-node and debug settings to every month of a chain', async () => {
    vi.stubEnv('PBS_NODEFILE', '/var/spool/nodes');

    const launcher = await run(['chain', configPath, '--months', '2', '--multi-node', '--debug']);

    expect(launcher.requests).toHaveLength(2);
    for (const request of launcher.requests) {
      expect(request.args.slice(2, 6)).toEqual(['-bootstrap', 'pbsdsh', '-f', '/var/spool/nodes']);
      expect(request.env).toMatchObject({ GCM_MULTI_NODE: '1', GCM_DEBUG: '1' });
    }
  });

  it('reports archived restart months', async () => {
    await run(['status', configPath]);
    const restarts = join(root, 'work', 'exp', 'restarts');
    mkdirSync(restarts, { recursive: true });
    writeFileSync(join(restarts, 'res_2.tar'), '');
    writeFileSync(join(restarts, 'res_1.tar'), '');
    await run(['status', configPath]);

    expect(lines).toEqual(['exp: no restarts', 'exp: restarts for months 1, 2']);
  });

  it('clears the scratch directory', async () => {
    const runDir = join(root, 'work', 'exp', 'run');
    mkdirSync(runDir, { recursive: true });

    await run(['clear', configPath]);

    expect(existsSync(runDir)).toBe(false);
    expect(lines).toEqual([`Removed ${runDir}`]);
  });

  it('fails without the runner environment', async () => {
    const program = createProgram({ env: {}, print: vi.fn() });

    await expect(program.parseAsync(['node', 'gcmrun', 'status', configPath])).rejects.toThrow(
      /^Invalid runner environment: GCM_BASE must be set/
    );
  });
});
