import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Experiment } from '@gcmrun/core';
import { ValidationError } from '@gcmrun/utils';
import { RunLifecycleController } from '../../src/run/RunLifecycleController.js';
import { listArchivedMonths } from '../../src/run/maintenance.js';
import {
  generateParameterCombinations,
  runParameterSweep,
  sweepExperimentName,
} from '../../src/sweep/parameter-sweep.js';
import { FakeLauncher, fixedClock, makeConfig, makeExperiment, recordingLogger, succeed } from '../helpers/fixtures.js';

describe('generateParameterCombinations', () => {
  it('takes the cartesian product in declaration order', () => {
    const combos = generateParameterCombinations({
      astronomy_nml: { obliq: [0, 15] },
      main_nml: { days: [30, 60] },
    });

    expect(combos.map((combo) => combo.map(({ value }) => value))).toEqual([
      [0, 30],
      [0, 60],
      [15, 30],
      [15, 60],
    ]);
    expect(combos[0]).toEqual([
      { section: 'astronomy_nml', parameter: 'obliq', value: 0 },
      { section: 'main_nml', parameter: 'days', value: 30 },
    ]);
  });

  it('yields nothing for no parameters or an empty axis', () => {
    expect(generateParameterCombinations({})).toEqual([]);
    expect(generateParameterCombinations({ a: { x: [1, 2], y: [] } })).toEqual([]);
  });
});

describe('sweepExperimentName', () => {
  it('abbreviates section and parameter names', () => {
    expect(
      sweepExperimentName('hs', [
        { section: 'astronomy_nml', parameter: 'obliq', value: 15 },
        { section: 'spectral_dynamics_nml', parameter: 'damping_order', value: 4 },
      ])
    ).toBe('hs_ast_obliq_15_spe_dampi_4');
  });

  it('keeps names filesystem-safe', () => {
    expect(sweepExperimentName('hs', [{ section: 'main_nml', parameter: 'calendar', value: 'no calendar/x' }])).toBe(
      'hs_mai_calen_no-calendar-x'
    );
    expect(sweepExperimentName('hs', [{ section: 'a', parameter: 'levels', value: [1.5, 2] }])).toBe('hs_a_level_1.5-2');
    expect(sweepExperimentName('hs', [{ section: 'a', parameter: 'flag', value: true }])).toBe('hs_a_flag_true');
  });
});

describe('runParameterSweep', () => {
  let root: string;
  let base: Experiment;
  let launcher: FakeLauncher;
  let controller: RunLifecycleController;
  const values = { astronomy_nml: { obliq: [0, 15] }, main_nml: { days: [30, 60] } };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'gcmrun-sweep-'));
    base = makeExperiment(makeConfig(root), 'hs');
    launcher = new FakeLauncher();
    controller = new RunLifecycleController({ launcher, logger: recordingLogger(), clock: fixedClock });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('runs an independent restart chain per combination', async () => {
    const namelists = new Map<string, string>();
    launcher.setBehaviour(async (request) => {
      namelists.set(request.cwd, readFileSync(join(request.cwd, 'input.nml'), 'utf8'));
      return succeed(request);
    });

    const result = await runParameterSweep(base, values, { runs: 2, controller });

    expect(result.failed).toEqual([]);
    expect(result.notStarted).toEqual([]);
    expect(result.completed.map((run) => run.experiment)).toEqual([
      'hs_ast_obliq_0_mai_days_30',
      'hs_ast_obliq_0_mai_days_60',
      'hs_ast_obliq_15_mai_days_30',
      'hs_ast_obliq_15_mai_days_60',
    ]);
    expect(launcher.requests).toHaveLength(8);
    expect(launcher.requests.every((request) => request.env.GCM_NUM_CORES === '16')).toBe(true);

    const derived = base.derive('hs_ast_obliq_15_mai_days_60');
    expect(await listArchivedMonths(derived)).toEqual([1, 2]);
    expect(namelists.get(derived.layout.runDir)).toBe(
      "&main_nml\n    days = 60\n    calendar = 'thirty_day'\n/\n\n&astronomy_nml\n    obliq = 15\n/\n"
    );
    expect(base.namelist.hasSection('astronomy_nml')).toBe(false);
  });

  it('uses the base executable for every combination', async () => {
    await runParameterSweep(base, { main_nml: { days: [30, 60] } }, { runs: 1, controller });

    expect(launcher.requests.map((request) => request.args[2])).toEqual([base.executablePath, base.executablePath]);
  });

  it('runs combinations concurrently up to the limit', async () => {
    const result = await runParameterSweep(base, values, { runs: 1, maxConcurrency: 2, controller });

    expect(result.completed).toHaveLength(4);
  });

  it('records a failing combination and carries on', async () => {
    launcher.setBehaviour(async (request) => {
      if (request.cwd.includes('obliq_15_mai_days_30')) {
        return { status: 'exited', exitCode: 9 };
      }
      return succeed(request);
    });

    const result = await runParameterSweep(base, values, { runs: 2, controller });

    expect(result.completed).toHaveLength(3);
    expect(result.failed).toEqual([
      {
        experiment: 'hs_ast_obliq_15_mai_days_30',
        combination: [
          { section: 'astronomy_nml', parameter: 'obliq', value: 15 },
          { section: 'main_nml', parameter: 'days', value: 30 },
        ],
        error: 'gcm.x exited with code 9',
      },
    ]);
  });

  it('refuses values that would share an experiment directory', async () => {
    const colliding = { main_nml: { calendar: ['thirty day', 'thirty/day', 'thirty_day'] } };

    await expect(runParameterSweep(base, colliding, { runs: 1, controller })).rejects.toThrow(
      'Sweep values map to the same experiment name: hs_mai_calen_thirty-day'
    );
    await expect(runParameterSweep(base, colliding, { runs: 1, controller })).rejects.toThrow(ValidationError);
    expect(launcher.requests).toHaveLength(0);
  });

  it('stops launching new combinations once cancelled', async () => {
    const abort = new AbortController();
    launcher.setBehaviour(async (request) => {
      abort.abort();
      return succeed(request);
    });

    const result = await runParameterSweep(base, values, { runs: 3, controller, signal: abort.signal });

    expect(result.completed.map((run) => run.experiment)).toEqual(['hs_ast_obliq_0_mai_days_30']);
    expect(result.completed[0]?.chain.interrupted).toBe(true);
    expect(result.notStarted).toEqual([
      'hs_ast_obliq_0_mai_days_60',
      'hs_ast_obliq_15_mai_days_30',
      'hs_ast_obliq_15_mai_days_60',
    ]);
    // month 2 sees the aborted signal before launching
    expect(launcher.requests).toHaveLength(1);
  });
});
