/**
 * Launch plan
 *
 * How the executable is started for one month: through the MPI launcher,
 * with the run parameters handed over as GCM_* environment variables.
 */

import type { Experiment } from '@gcmrun/core';
import { ConfigurationError, ValidationError } from '@gcmrun/utils';

export interface LaunchPlanParams {
  month: number;
  numCores: number;
  multiNode: boolean;
  restartFile?: string;
  outputDir: string;
  debug: boolean;
  /** Host list for multi-node launches; defaults to $PBS_NODEFILE */
  nodeFile?: string;
}

export interface LaunchPlan {
  command: string;
  args: string[];
  env: Record<string, string>;
}

export function buildLaunchPlan(experiment: Experiment, params: LaunchPlanParams): LaunchPlan {
  const { month, numCores, multiNode, restartFile, outputDir, debug } = params;

  if (!Number.isInteger(numCores) || numCores < 1) {
    throw new ValidationError(`Core count must be a positive integer, got ${numCores}`, { numCores });
  }

  const args = ['-np', String(numCores)];
  if (multiNode) {
    const nodeFile = params.nodeFile ?? process.env.PBS_NODEFILE;
    if (!nodeFile) {
      throw new ConfigurationError('Multi-node runs need a node file (PBS_NODEFILE)', 'PBS_NODEFILE');
    }
    args.push('-bootstrap', 'pbsdsh', '-f', nodeFile);
  }
  args.push(experiment.executablePath);

  return {
    command: experiment.config.mpiLauncher,
    args,
    env: {
      GCM_MONTH: String(month),
      GCM_NUM_CORES: String(numCores),
      GCM_MULTI_NODE: multiNode ? '1' : '0',
      GCM_RESTART_FILE: restartFile ?? '',
      GCM_OUTPUT_DIR: outputDir,
      GCM_RUN_DIR: experiment.layout.runDir,
      GCM_EXEC_DIR: experiment.layout.execDir,
      GCM_DEBUG: debug ? '1' : '0',
      GCM_ENV_SOURCE: experiment.config.envSource,
    },
  };
}
