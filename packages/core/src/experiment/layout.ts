/**
 * Experiment directory layout
 *
 *   <work>/<name>/exec                  compiled executable (exec_debug for debug builds)
 *   <work>/<name>/restarts/res_<m>.tar  one restart archive per month, append-only
 *   <work>/<name>/run                   scratch area reused by every run
 *   <work>/<name>/run/INPUT             staged inputs and unpacked restart
 *   <work>/<name>/run/RESTART           state written by the executable
 *   <work>/<name>/.run.lock             run-in-progress marker
 *   <data>/<name>/run<NNN>              archived output, month zero-padded to 3
 */

import { join } from 'path';
import type { RunnerConfig } from '@gcmrun/utils';
import { ValidationError } from '@gcmrun/utils';

export const RESTART_ARCHIVE_EXTENSION = 'tar';

export interface ExperimentLayout {
  name: string;
  workDir: string;
  execDir: string;
  restartDir: string;
  runDir: string;
  inputDir: string;
  restartStagingDir: string;
  dataDir: string;
  lockPath: string;
}

const EXPERIMENT_NAME = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;

export function assertExperimentName(name: string): void {
  if (!EXPERIMENT_NAME.test(name)) {
    throw new ValidationError(`Invalid experiment name '${name}'`, { name });
  }
}

export function assertMonth(month: number): void {
  if (!Number.isInteger(month) || month < 1) {
    throw new ValidationError(`Month must be a positive integer, got ${month}`, { month });
  }
}

export function resolveExperimentLayout(
  name: string,
  config: Pick<RunnerConfig, 'workDir' | 'dataDir'>,
  options: { debug?: boolean; execDir?: string } = {}
): ExperimentLayout {
  assertExperimentName(name);
  const workDir = join(config.workDir, name);
  const runDir = join(workDir, 'run');

  return {
    name,
    workDir,
    execDir: options.execDir ?? join(workDir, options.debug ? 'exec_debug' : 'exec'),
    restartDir: join(workDir, 'restarts'),
    runDir,
    inputDir: join(runDir, 'INPUT'),
    restartStagingDir: join(runDir, 'RESTART'),
    dataDir: join(config.dataDir, name),
    lockPath: join(workDir, '.run.lock'),
  };
}

export function outputDirFor(layout: ExperimentLayout, month: number): string {
  assertMonth(month);
  return join(layout.dataDir, `run${String(month).padStart(3, '0')}`);
}

export function restartArchiveName(month: number): string {
  assertMonth(month);
  return `res_${month}.${RESTART_ARCHIVE_EXTENSION}`;
}

export function restartArchivePath(layout: ExperimentLayout, month: number): string {
  return join(layout.restartDir, restartArchiveName(month));
}
