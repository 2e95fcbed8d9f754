/**
 * Experiment maintenance
 *
 * Directory housekeeping outside of a run. Both clear operations take the
 * run lock, so they fail with RunInProgressError instead of pulling the
 * scratch directory out from under a running month.
 */

import { readdir, rm } from 'fs/promises';
import type { Experiment } from '@gcmrun/core';
import { RESTART_ARCHIVE_EXTENSION } from '@gcmrun/core';
import { isErrnoException } from './fs-helpers.js';
import { acquireRunLock } from './run-lock.js';

const RESTART_ARCHIVE = new RegExp(`^res_(\\d+)\\.${RESTART_ARCHIVE_EXTENSION}$`);

/**
 * Remove the scratch run directory
 */
export async function clearRunDir(experiment: Experiment): Promise<void> {
  const lock = await acquireRunLock(experiment.name, experiment.layout.lockPath);
  try {
    await rm(experiment.layout.runDir, { recursive: true, force: true });
  } finally {
    await lock.release();
  }
}

/**
 * Remove the experiment's whole work directory: executable, restarts and scratch.
 * Archived output under the data directory is kept.
 */
export async function clearWorkDir(experiment: Experiment): Promise<void> {
  const lock = await acquireRunLock(experiment.name, experiment.layout.lockPath);
  try {
    await rm(experiment.layout.workDir, { recursive: true, force: true });
  } finally {
    await lock.release();
  }
}

/**
 * Months with a restart archive, ascending
 */
export async function listArchivedMonths(experiment: Experiment): Promise<number[]> {
  let names: string[];
  try {
    names = await readdir(experiment.layout.restartDir);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const months: number[] = [];
  for (const name of names) {
    const match = RESTART_ARCHIVE.exec(name);
    if (match?.[1] !== undefined) {
      months.push(Number.parseInt(match[1], 10));
    }
  }
  return months.sort((a, b) => a - b);
}
