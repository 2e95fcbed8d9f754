/**
 * Parameter Sweep Driver
 * ======================
 * Runs one independent restart chain per combination of namelist values.
 *
 *   runParameterSweep(base, { astronomy_nml: { obliq: [0, 15, 30] } })
 *
 * derives `<base>_ast_obliq_0`, `<base>_ast_obliq_15` and `<base>_ast_obliq_30`,
 * each running months 1..runs (month 1 cold).
 */

import type { Experiment, NamelistValue, RunOptions } from '@gcmrun/core';
import { ValidationError, createLogger } from '@gcmrun/utils';
import type { RunChainResult } from '../chain/runChain.js';
import { runChain } from '../chain/runChain.js';
import { clearRunDir } from '../run/maintenance.js';
import { RunLifecycleController } from '../run/RunLifecycleController.js';

/** section -> parameter -> values to try */
export type SweepValues = Record<string, Record<string, readonly NamelistValue[]>>;

export interface SweepAssignment {
  section: string;
  parameter: string;
  value: NamelistValue;
}

export type SweepCombination = SweepAssignment[];

export interface ParameterSweepOptions {
  /** Months per combination (default 10) */
  runs?: number;
  numCores?: number;
  /** Combinations run at the same time (default 1) */
  maxConcurrency?: number;
  controller?: RunLifecycleController;
  /** Stops new combinations from starting and interrupts running ones */
  signal?: AbortSignal;
  runOptions?: Omit<RunOptions, 'numCores' | 'signal' | 'useRestart' | 'restartFile'>;
}

export interface SweepRunResult {
  experiment: string;
  combination: SweepCombination;
  chain: RunChainResult;
}

export interface SweepFailure {
  experiment: string;
  combination: SweepCombination;
  error: string;
}

export interface ParameterSweepResult {
  completed: SweepRunResult[];
  failed: SweepFailure[];
  /** Combinations never started because the sweep was cancelled */
  notStarted: string[];
}

const logger = createLogger('workflows:sweep');

/**
 * Cartesian product over every (section, parameter) axis, in declaration
 * order; the last axis varies fastest
 */
export function generateParameterCombinations(values: SweepValues): SweepCombination[] {
  const axes: SweepAssignment[][] = [];
  for (const [section, parameters] of Object.entries(values)) {
    for (const [parameter, candidates] of Object.entries(parameters)) {
      axes.push(candidates.map((value) => ({ section, parameter, value })));
    }
  }

  let combinations: SweepCombination[] = [[]];
  for (const axis of axes) {
    combinations = combinations.flatMap((combo) => axis.map((assignment) => [...combo, assignment]));
  }
  return axes.length === 0 ? [] : combinations;
}

function formatSweepValue(value: NamelistValue): string {
  return Array.isArray(value) ? value.map(String).join(',') : String(value);
}

export function sweepExperimentName(base: string, combination: SweepCombination): string {
  const title = combination
    .map(({ section, parameter, value }) => `${section.slice(0, 3)}_${parameter.slice(0, 5)}_${formatSweepValue(value)}`)
    .join('_');
  return `${base}_${title}`.replace(/[^A-Za-z0-9._+-]/g, '-');
}

/**
 * Every combination must get its own experiment directory; values that only
 * differ in characters replaced for the filesystem would share one
 */
function assertDistinctNames(names: readonly string[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }
  if (duplicates.size > 0) {
    throw new ValidationError(`Sweep values map to the same experiment name: ${[...duplicates].join(', ')}`, {
      duplicates: [...duplicates],
    });
  }
}

export async function runParameterSweep(
  base: Experiment,
  values: SweepValues,
  options: ParameterSweepOptions = {}
): Promise<ParameterSweepResult> {
  const runs = options.runs ?? 10;
  const maxConcurrency = Math.max(1, options.maxConcurrency ?? 1);
  const controller = options.controller ?? new RunLifecycleController();
  const combinations = generateParameterCombinations(values).map((combination) => ({
    combination,
    name: sweepExperimentName(base.name, combination),
  }));
  assertDistinctNames(combinations.map(({ name }) => name));

  const completed: SweepRunResult[] = [];
  const failed: SweepFailure[] = [];
  const notStarted: string[] = [];

  logger.info('Starting parameter sweep', {
    experiment: base.name,
    combinations: combinations.length,
    runs,
    maxConcurrency,
  });

  const runCombination = async ({ combination, name }: { combination: SweepCombination; name: string }): Promise<void> => {
    try {
      const experiment = base.derive(name);
      for (const { section, parameter, value } of combination) {
        experiment.setNamelistValue(section, parameter, value);
      }
      await clearRunDir(experiment);

      const chain = await runChain(experiment, controller, {
        ...options.runOptions,
        count: runs,
        coldStart: true,
        numCores: options.numCores ?? 16,
        signal: options.signal,
      });
      completed.push({ experiment: name, combination, chain });
      logger.info('Sweep combination finished', { experiment: name, interrupted: chain.interrupted });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failed.push({ experiment: name, combination, error: message });
      logger.warn('Sweep combination failed', { experiment: name, error: message });
    }
  };

  for (let i = 0; i < combinations.length; i += maxConcurrency) {
    const slice = combinations.slice(i, i + maxConcurrency);
    if (options.signal?.aborted) {
      notStarted.push(...combinations.slice(i).map(({ name }) => name));
      logger.warn('Sweep cancelled', { experiment: base.name, notStarted: notStarted.length });
      break;
    }
    await Promise.all(slice.map(runCombination));
  }

  logger.info('Parameter sweep completed', {
    experiment: base.name,
    completed: completed.length,
    failed: failed.length,
    notStarted: notStarted.length,
  });
  return { completed, failed, notStarted };
}
