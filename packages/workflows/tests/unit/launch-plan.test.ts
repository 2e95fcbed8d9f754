import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError, ValidationError } from '@gcmrun/utils';
import { buildLaunchPlan } from '../../src/run/launch-plan.js';
import { makeConfig, makeExperiment } from '../helpers/fixtures.js';

const experiment = makeExperiment(makeConfig('/scratch'));

const base = {
  month: 3,
  numCores: 8,
  multiNode: false,
  outputDir: '/scratch/data/exp/run003',
  debug: false,
};

describe('buildLaunchPlan', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('launches the executable through the MPI launcher on one node', () => {
    const plan = buildLaunchPlan(experiment, { ...base, restartFile: '/scratch/work/exp/restarts/res_2.tar' });

    expect(plan.command).toBe('mpirun');
    expect(plan.args).toEqual(['-np', '8', '/scratch/work/exp/exec/gcm.x']);
    expect(plan.env).toEqual({
      GCM_MONTH: '3',
      GCM_NUM_CORES: '8',
      GCM_MULTI_NODE: '0',
      GCM_RESTART_FILE: '/scratch/work/exp/restarts/res_2.tar',
      GCM_OUTPUT_DIR: '/scratch/data/exp/run003',
      GCM_RUN_DIR: '/scratch/work/exp/run',
      GCM_EXEC_DIR: '/scratch/work/exp/exec',
      GCM_DEBUG: '0',
      GCM_ENV_SOURCE: '/scratch/base/src/extra/env/test',
    });
  });

  it('passes an empty restart for a cold start', () => {
    expect(buildLaunchPlan(experiment, base).env.GCM_RESTART_FILE).toBe('');
  });

  it('adds the node file for multi-node launches', () => {
    const plan = buildLaunchPlan(experiment, { ...base, numCores: 32, multiNode: true, nodeFile: '/tmp/nodes' });

    expect(plan.args).toEqual(['-np', '32', '-bootstrap', 'pbsdsh', '-f', '/tmp/nodes', '/scratch/work/exp/exec/gcm.x']);
    expect(plan.env.GCM_MULTI_NODE).toBe('1');
  });

  it('falls back to PBS_NODEFILE', () => {
    vi.stubEnv('PBS_NODEFILE', '/var/spool/nodes');

    const plan = buildLaunchPlan(experiment, { ...base, multiNode: true });

    expect(plan.args).toContain('/var/spool/nodes');
  });

  it('rejects multi-node launches without a node file', () => {
    vi.stubEnv('PBS_NODEFILE', '');

    expect(() => buildLaunchPlan(experiment, { ...base, multiNode: true })).toThrow(ConfigurationError);
  });

  it.each([0, -4, 2.5])('rejects a core count of %s', (numCores) => {
    expect(() => buildLaunchPlan(experiment, { ...base, numCores })).toThrow(
      `Core count must be a positive integer, got ${numCores}`
    );
    expect(() => buildLaunchPlan(experiment, { ...base, numCores })).toThrow(ValidationError);
  });
});
