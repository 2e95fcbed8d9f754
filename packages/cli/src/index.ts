/**
 * @gcmrun/cli - Command-line interface
 */

export { createProgram } from './program.js';
export { registerExperimentCommands, EXIT_INTERRUPTED } from './commands/experiment.js';
export type { ExperimentCommandDeps } from './commands/experiment.js';
export {
  ExperimentFileSchema,
  SweepFileSchema,
  detectConfigFormat,
  loadExperiment,
  loadExperimentFile,
  loadSweepFile,
  readConfigFile,
} from './core/config-loader.js';
export type { ExperimentFile } from './core/config-loader.js';
export {
  EXIT_CONFIGURATION,
  EXIT_FAILURE,
  exitCodeFor,
  formatError,
  handleError,
} from './core/error-handler.js';
export { coerceNumber, positiveIntOption } from './core/coerce.js';
