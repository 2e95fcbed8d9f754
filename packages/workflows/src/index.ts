/**
 * @gcmrun/workflows - Run orchestration
 *
 * Executes experiment months against the filesystem and the MPI launcher,
 * chains them through restart archives, and drives parameter sweeps.
 */

export { RunLifecycleController, DEFAULT_NUM_CORES } from './run/RunLifecycleController.js';
export type { RunLifecycleControllerDeps } from './run/RunLifecycleController.js';
export { clearRunDir, clearWorkDir, listArchivedMonths } from './run/maintenance.js';
export { acquireRunLock } from './run/run-lock.js';
export type { RunLockHandle } from './run/run-lock.js';
export { createRestartArchive, extractRestartArchive, listRestartStateFiles } from './run/restart-archive.js';
export { archiveRunOutput, pruneRestart, LIGHT_RESTART_RETENTION } from './run/output-archive.js';
export type { ArchiveOutputParams, ArchiveOutputResult } from './run/output-archive.js';
export { buildLaunchPlan } from './run/launch-plan.js';
export type { LaunchPlan, LaunchPlanParams } from './run/launch-plan.js';

export { runChain } from './chain/runChain.js';
export type { RunChainOptions, RunChainResult } from './chain/runChain.js';

export {
  generateParameterCombinations,
  sweepExperimentName,
  runParameterSweep,
} from './sweep/parameter-sweep.js';
export type {
  SweepValues,
  SweepAssignment,
  SweepCombination,
  ParameterSweepOptions,
  ParameterSweepResult,
  SweepRunResult,
  SweepFailure,
} from './sweep/parameter-sweep.js';

export { ExecaProcessLauncher } from './adapters/execaProcessLauncher.js';
export type { ExecaProcessLauncherOptions } from './adapters/execaProcessLauncher.js';
