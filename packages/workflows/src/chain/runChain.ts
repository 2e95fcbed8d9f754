/**
 * Run chain
 *
 * Consecutive months of one experiment, each restarting from the one
 * before. Runs are strictly sequential.
 */

import type { Experiment, RunOptions, RunOutcome } from '@gcmrun/core';
import { assertMonth } from '@gcmrun/core';
import { ValidationError } from '@gcmrun/utils';
import type { RunLifecycleController } from '../run/RunLifecycleController.js';

export interface RunChainOptions extends Omit<RunOptions, 'useRestart' | 'restartFile'> {
  /** First month of the chain (default 1) */
  fromMonth?: number;
  /** Number of months to run */
  count: number;
  /** Run the first month without a restart (default: only when starting at month 1) */
  coldStart?: boolean;
  /** Restart archive for the first month, instead of the previous month's */
  restartFile?: string;
}

export interface RunChainResult {
  outcomes: RunOutcome[];
  /** True when a run was interrupted and the rest of the chain was not started */
  interrupted: boolean;
}

/**
 * Skipped months (output already archived) continue the chain, since their
 * restart archive is still on disk. An interrupted month ends it. Errors
 * propagate after the months before them have been archived.
 */
export async function runChain(
  experiment: Experiment,
  controller: RunLifecycleController,
  options: RunChainOptions
): Promise<RunChainResult> {
  const { fromMonth = 1, count, coldStart, restartFile, ...runOptions } = options;
  assertMonth(fromMonth);
  if (!Number.isInteger(count) || count < 1) {
    throw new ValidationError(`Chain length must be a positive integer, got ${count}`, { count });
  }

  const outcomes: RunOutcome[] = [];
  for (let month = fromMonth; month < fromMonth + count; month++) {
    const first = month === fromMonth;
    const outcome = await controller.run(experiment, month, {
      ...runOptions,
      useRestart: !(first && (coldStart ?? fromMonth === 1)),
      restartFile: first ? restartFile : undefined,
    });
    outcomes.push(outcome);

    if (outcome.status === 'interrupted') {
      return { outcomes, interrupted: true };
    }
  }
  return { outcomes, interrupted: false };
}
