/**
 * Shared fixtures for run lifecycle tests
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { vi } from 'vitest';
import type { LaunchRequest, LaunchResult, LoggerPort, ProcessLauncherPort } from '@gcmrun/core';
import { DiagTable, Experiment } from '@gcmrun/core';
import type { RunnerConfig } from '@gcmrun/utils';

export function makeConfig(root: string): RunnerConfig {
  return {
    baseDir: join(root, 'base'),
    workDir: join(root, 'work'),
    dataDir: join(root, 'data'),
    envProfile: 'test',
    envSource: join(root, 'base', 'src', 'extra', 'env', 'test'),
    mpiLauncher: 'mpirun',
  };
}

export function makeExperiment(config: RunnerConfig, name = 'exp'): Experiment {
  const experiment = new Experiment(name, config);
  experiment.updateNamelist({ main_nml: { days: 30, calendar: 'thirty_day' } });
  const diagTable = new DiagTable().addFile('daily', 1, 'days');
  diagTable.addField('dynamics', 'ps');
  return experiment.useDiagTable(diagTable);
}

export function recordingLogger(): LoggerPort {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export const fixedClock = { nowMs: (): number => 0 };

export type LaunchBehaviour = (request: LaunchRequest) => Promise<LaunchResult>;

/**
 * What a successful model run leaves behind: restart state in RESTART and
 * a result file at the top of the run directory
 */
export async function writeModelOutput(request: LaunchRequest): Promise<void> {
  const month = request.env.GCM_MONTH ?? '?';
  await mkdir(join(request.cwd, 'RESTART'), { recursive: true });
  await writeFile(join(request.cwd, 'RESTART', 'atmos.res.nc'), `state ${month}`);
  await writeFile(join(request.cwd, 'daily.nc'), `data ${month}`);
}

export const succeed: LaunchBehaviour = async (request) => {
  await writeModelOutput(request);
  request.onLine('Integration completed through 30 days');
  return { status: 'exited', exitCode: 0 };
};

export class FakeLauncher implements ProcessLauncherPort {
  readonly requests: LaunchRequest[] = [];

  constructor(private behaviour: LaunchBehaviour = succeed) {}

  setBehaviour(behaviour: LaunchBehaviour): void {
    this.behaviour = behaviour;
  }

  async launch(request: LaunchRequest): Promise<LaunchResult> {
    this.requests.push(request);
    return this.behaviour(request);
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
