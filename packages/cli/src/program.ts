/**
 * gcmrun program definition
 */

import { Command } from 'commander';
import type { ExperimentCommandDeps } from './commands/experiment.js';
import { registerExperimentCommands } from './commands/experiment.js';

export function createProgram(deps: ExperimentCommandDeps = {}): Command {
  const program = new Command();
  program
    .name('gcmrun')
    .description('Run restart-chained climate model experiments')
    .version('0.1.0');

  registerExperimentCommands(program, deps);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });
  return program;
}
