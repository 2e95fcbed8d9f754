import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Experiment } from '@gcmrun/core';
import { RunInProgressError } from '@gcmrun/utils';
import { clearRunDir, clearWorkDir, listArchivedMonths } from '../../src/run/maintenance.js';
import { acquireRunLock } from '../../src/run/run-lock.js';
import { makeConfig, makeExperiment } from '../helpers/fixtures.js';

describe('experiment maintenance', () => {
  let root: string;
  let experiment: Experiment;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'gcmrun-maint-'));
    experiment = makeExperiment(makeConfig(root));
    mkdirSync(experiment.layout.inputDir, { recursive: true });
    mkdirSync(experiment.layout.restartDir, { recursive: true });
    mkdirSync(experiment.layout.dataDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists archived months numerically and ignores other files', async () => {
    for (const name of ['res_10.tar', 'res_2.tar', 'res_3.tar.partial', 'res_x.tar', 'notes.txt']) {
      writeFileSync(join(experiment.layout.restartDir, name), '');
    }

    await expect(listArchivedMonths(experiment)).resolves.toEqual([2, 10]);
  });

  it('reports no months before anything was archived', async () => {
    rmSync(experiment.layout.restartDir, { recursive: true });

    await expect(listArchivedMonths(experiment)).resolves.toEqual([]);
  });

  it('clears the scratch directory and keeps restarts', async () => {
    writeFileSync(join(experiment.layout.restartDir, 'res_1.tar'), '');

    await clearRunDir(experiment);

    expect(existsSync(experiment.layout.runDir)).toBe(false);
    expect(existsSync(join(experiment.layout.restartDir, 'res_1.tar'))).toBe(true);
    expect(existsSync(experiment.layout.lockPath)).toBe(false);
  });

  it('clears the work directory and keeps archived output', async () => {
    await clearWorkDir(experiment);

    expect(existsSync(experiment.layout.workDir)).toBe(false);
    expect(existsSync(experiment.layout.dataDir)).toBe(true);
  });

  it('refuses to clear while a run holds the lock', async () => {
    const lock = await acquireRunLock(experiment.name, experiment.layout.lockPath);
    try {
      await expect(clearRunDir(experiment)).rejects.toThrow(RunInProgressError);
      await expect(clearWorkDir(experiment)).rejects.toThrow(RunInProgressError);
      expect(existsSync(experiment.layout.runDir)).toBe(true);
    } finally {
      await lock.release();
    }
  });
});
