/**
 * Experiment Commands - run, chain, sweep, render, status, clear
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Command } from 'commander';
import type { Experiment, RunOutcome } from '@gcmrun/core';
import { describeProgress, renderDiagTable, writeNamelistFile } from '@gcmrun/core';
import {
  RunLifecycleController,
  clearRunDir,
  clearWorkDir,
  listArchivedMonths,
  runChain,
  runParameterSweep,
} from '@gcmrun/workflows';
import { addFileTransport, getRunnerConfig, removeFileTransport } from '@gcmrun/utils';
import { positiveIntOption } from '../core/coerce.js';
import { EXIT_FAILURE, EXIT_INTERRUPTED } from '../core/error-handler.js';
import { loadExperiment, loadSweepFile } from '../core/config-loader.js';

export { EXIT_INTERRUPTED };

export interface ExperimentCommandDeps {
  env?: NodeJS.ProcessEnv;
  controller?: RunLifecycleController;
  /** Aborted on SIGINT/SIGTERM by the entry point */
  signal?: AbortSignal;
  print?: (line: string) => void;
  setExitCode?: (code: number) => void;
}

interface RunCommandOptions {
  month: number;
  cold?: boolean;
  restartFile?: string;
  cores: number;
  multiNode?: boolean;
  overwrite?: boolean;
  light?: boolean;
  debug?: boolean;
  logFile?: string;
}

interface ChainCommandOptions {
  months: number;
  from: number;
  cold?: boolean;
  cores: number;
  multiNode?: boolean;
  debug?: boolean;
  overwrite?: boolean;
  light?: boolean;
  logFile?: string;
}

interface SweepCommandOptions {
  runs: number;
  cores: number;
  concurrency: number;
  light?: boolean;
  logFile?: string;
}

interface ClearCommandOptions {
  all?: boolean;
}

async function withLogFile<T>(logFile: string | undefined, fn: () => Promise<T>): Promise<T> {
  if (logFile === undefined) {
    return fn();
  }
  const transport = addFileTransport(logFile);
  try {
    return await fn();
  } finally {
    removeFileTransport(transport);
  }
}

function describeOutcome(experiment: Experiment, outcome: RunOutcome): string {
  switch (outcome.status) {
    case 'completed': {
      const progress = outcome.record.lastProgress;
      const through = progress ? ` (through ${describeProgress(progress)})` : '';
      return `${experiment.name} month ${outcome.record.month}: completed${through} -> ${outcome.outputDir}`;
    }
    case 'skipped':
      return `${experiment.name} month ${outcome.month}: skipped, ${outcome.outputDir} exists`;
    case 'interrupted':
      return `${experiment.name} month ${outcome.record.month}: interrupted`;
  }
}

export function registerExperimentCommands(program: Command, deps: ExperimentCommandDeps = {}): void {
  const print = deps.print ?? ((line: string) => process.stdout.write(`${line}\n`));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  let controller = deps.controller;
  const getController = (): RunLifecycleController => (controller ??= new RunLifecycleController());
  const load = async (configPath: string): Promise<Experiment> =>
    loadExperiment(configPath, getRunnerConfig(deps.env ?? process.env));

  program
    .command('run')
    .description('Run one month of an experiment')
    .argument('<config>', 'experiment file (YAML or JSON)')
    .requiredOption('--month <n>', 'month to run', positiveIntOption('month'))
    .option('--cold', 'start without a restart')
    .option('--restart-file <path>', 'restart archive to start from')
    .option('--cores <n>', 'MPI processes', positiveIntOption('cores'), 8)
    .option('--multi-node', 'launch across the nodes in $PBS_NODEFILE')
    .option('--overwrite', 'replace existing output for the month')
    .option('--light', 'archive primary results and the last two restarts only')
    .option('--debug', 'run in debug mode (GCM_DEBUG=1)')
    .option('--log-file <path>', 'also write the run log to this file')
    .action(async (configPath: string, options: RunCommandOptions) => {
      const experiment = await load(configPath);
      const outcome = await withLogFile(options.logFile, () =>
        getController().run(experiment, options.month, {
          useRestart: !options.cold,
          restartFile: options.restartFile,
          numCores: options.cores,
          multiNode: options.multiNode ?? false,
          overwriteData: options.overwrite ? true : undefined,
          archivePolicy: options.light ? 'light' : 'full',
          debug: options.debug ? true : undefined,
          signal: deps.signal,
        })
      );
      print(describeOutcome(experiment, outcome));
      if (outcome.status === 'interrupted') {
        setExitCode(EXIT_INTERRUPTED);
      }
    });

  program
    .command('chain')
    .description('Run consecutive months, each restarting from the one before')
    .argument('<config>', 'experiment file (YAML or JSON)')
    .requiredOption('--months <n>', 'number of months', positiveIntOption('months'))
    .option('--from <n>', 'first month', positiveIntOption('from'), 1)
    .option('--cold', 'run the first month without a restart')
    .option('--cores <n>', 'MPI processes', positiveIntOption('cores'), 8)
    .option('--multi-node', 'launch across the nodes in $PBS_NODEFILE')
    .option('--debug', 'run in debug mode (GCM_DEBUG=1)')
    .option('--overwrite', 'replace existing output')
    .option('--light', 'archive primary results and the last two restarts only')
    .option('--log-file <path>', 'also write the run log to this file')
    .action(async (configPath: string, options: ChainCommandOptions) => {
      const experiment = await load(configPath);
      const result = await withLogFile(options.logFile, () =>
        runChain(experiment, getController(), {
          fromMonth: options.from,
          count: options.months,
          coldStart: options.cold ? true : undefined,
          numCores: options.cores,
          multiNode: options.multiNode ?? false,
          debug: options.debug ? true : undefined,
          overwriteData: options.overwrite ? true : undefined,
          archivePolicy: options.light ? 'light' : 'full',
          signal: deps.signal,
        })
      );
      for (const outcome of result.outcomes) {
        print(describeOutcome(experiment, outcome));
      }
      if (result.interrupted) {
        setExitCode(EXIT_INTERRUPTED);
      }
    });

  program
    .command('sweep')
    .description('Run one restart chain per combination of namelist values')
    .argument('<config>', 'experiment file (YAML or JSON)')
    .argument('<sweep-file>', 'section -> parameter -> values (YAML or JSON)')
    .option('--runs <n>', 'months per combination', positiveIntOption('runs'), 10)
    .option('--cores <n>', 'MPI processes per run', positiveIntOption('cores'), 16)
    .option('--concurrency <n>', 'combinations run at once', positiveIntOption('concurrency'), 1)
    .option('--light', 'archive primary results and the last two restarts only')
    .option('--log-file <path>', 'also write the sweep log to this file')
    .action(async (configPath: string, sweepPath: string, options: SweepCommandOptions) => {
      const experiment = await load(configPath);
      const values = await loadSweepFile(sweepPath);
      const result = await withLogFile(options.logFile, () =>
        runParameterSweep(experiment, values, {
          runs: options.runs,
          numCores: options.cores,
          maxConcurrency: options.concurrency,
          controller: getController(),
          signal: deps.signal,
          runOptions: { archivePolicy: options.light ? 'light' : 'full' },
        })
      );

      for (const run of result.completed) {
        print(`${run.experiment}: ${run.chain.interrupted ? 'interrupted' : 'completed'}`);
      }
      for (const failure of result.failed) {
        print(`${failure.experiment}: failed (${failure.error})`);
      }
      for (const name of result.notStarted) {
        print(`${name}: not started`);
      }
      if (result.notStarted.length > 0 || result.completed.some((run) => run.chain.interrupted)) {
        setExitCode(EXIT_INTERRUPTED);
      } else if (result.failed.length > 0) {
        setExitCode(EXIT_FAILURE);
      }
    });

  program
    .command('render')
    .description('Write input.nml and diag_table for inspection')
    .argument('<config>', 'experiment file (YAML or JSON)')
    .argument('<out-dir>', 'directory to write into')
    .action(async (configPath: string, outDir: string) => {
      const experiment = await load(configPath);
      const diagTable = renderDiagTable(experiment.diagTable, experiment.namelist, experiment.name);
      await mkdir(outDir, { recursive: true });
      await writeNamelistFile(experiment.namelist, join(outDir, 'input.nml'));
      await writeFile(join(outDir, 'diag_table'), diagTable, 'utf8');
      print(`Wrote input.nml and diag_table to ${outDir}`);
    });

  program
    .command('status')
    .description('List the months with a restart archive')
    .argument('<config>', 'experiment file (YAML or JSON)')
    .action(async (configPath: string) => {
      const experiment = await load(configPath);
      const months = await listArchivedMonths(experiment);
      print(
        months.length === 0
          ? `${experiment.name}: no restarts`
          : `${experiment.name}: restarts for months ${months.join(', ')}`
      );
    });

  program
    .command('clear')
    .description("Remove the experiment's scratch directory")
    .argument('<config>', 'experiment file (YAML or JSON)')
    .option('--all', 'remove the whole work directory, restarts included')
    .action(async (configPath: string, options: ClearCommandOptions) => {
      const experiment = await load(configPath);
      if (options.all) {
        await clearWorkDir(experiment);
        print(`Removed ${experiment.layout.workDir}`);
      } else {
        await clearRunDir(experiment);
        print(`Removed ${experiment.layout.runDir}`);
      }
    });
}
