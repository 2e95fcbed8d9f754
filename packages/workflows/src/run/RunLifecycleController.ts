/**
 * Run Lifecycle Controller
 * ========================
 * Executes one month of an experiment:
 *
 *   lock -> skip check -> resolve restart -> prepare scratch -> launch
 *        -> archive restart + output -> clear scratch -> unlock
 *
 * Nothing before "prepare scratch" mutates the filesystem, so configuration
 * and dependency errors leave the experiment exactly as it was. The restart
 * archive for a month is only written after a zero exit, and a failure while
 * archiving removes both that archive and the month's output, so a failed
 * month is never mistaken for a finished one.
 */

import { copyFile, mkdir, rm, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { DateTime, Duration } from 'luxon';
import type {
  ClockPort,
  Experiment,
  LaunchResult,
  LoggerPort,
  ProcessLauncherPort,
  RestartSource,
  RunOptions,
  RunOutcome,
  RunRecord,
} from '@gcmrun/core';
import {
  assertMonth,
  createSystemClock,
  describeProgress,
  outputDirFor,
  parseProgressLine,
  renderDiagTable,
  restartArchivePath,
  writeNamelistFile,
} from '@gcmrun/core';
import { AppError, ConfigurationError, DependencyError, ExecutionError, createLogger } from '@gcmrun/utils';
import { ExecaProcessLauncher } from '../adapters/execaProcessLauncher.js';
import { pathExists, resetDir } from './fs-helpers.js';
import { buildLaunchPlan } from './launch-plan.js';
import { archiveRunOutput } from './output-archive.js';
import { createRestartArchive, extractRestartArchive } from './restart-archive.js';
import { acquireRunLock } from './run-lock.js';

export const DEFAULT_NUM_CORES = 8;

export interface RunLifecycleControllerDeps {
  logger?: LoggerPort;
  launcher?: ProcessLauncherPort;
  clock?: ClockPort;
  /** Host list for multi-node launches; defaults to $PBS_NODEFILE */
  nodeFile?: string;
}

function isoTimestamp(ms: number): string {
  return DateTime.fromMillis(ms, { zone: 'utc' }).toISO() ?? new Date(ms).toISOString();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RunLifecycleController {
  private readonly logger: LoggerPort;
  private readonly launcher: ProcessLauncherPort;
  private readonly clock: ClockPort;
  private readonly nodeFile?: string;

  constructor(deps: RunLifecycleControllerDeps = {}) {
    this.logger = deps.logger ?? createLogger('workflows');
    this.launcher = deps.launcher ?? new ExecaProcessLauncher();
    this.clock = deps.clock ?? createSystemClock();
    this.nodeFile = deps.nodeFile;
  }

  async run(experiment: Experiment, month: number, options: RunOptions = {}): Promise<RunOutcome> {
    assertMonth(month);
    const lock = await acquireRunLock(experiment.name, experiment.layout.lockPath);
    try {
      return await this.runLocked(experiment, month, options);
    } finally {
      await lock.release();
    }
  }

  private async runLocked(experiment: Experiment, month: number, options: RunOptions): Promise<RunOutcome> {
    const { layout } = experiment;
    const outputDir = outputDirFor(layout, month);
    const overwrite = options.overwriteData ?? experiment.overwriteData;
    const outputExists = await pathExists(outputDir);

    if (outputExists && !overwrite) {
      this.logger.warn('Output already exists, skipping run', { experiment: experiment.name, month, outputDir });
      return { status: 'skipped', reason: 'output-exists', month, outputDir };
    }

    const restartSource = await this.resolveRestart(experiment, month, options);
    const debug = options.debug ?? experiment.debug;
    const plan = buildLaunchPlan(experiment, {
      month,
      numCores: options.numCores ?? DEFAULT_NUM_CORES,
      multiNode: options.multiNode ?? false,
      restartFile: restartSource.kind === 'cold' ? undefined : restartSource.path,
      outputDir,
      debug,
      nodeFile: this.nodeFile,
    });
    const diagTableText = renderDiagTable(experiment.diagTable, experiment.namelist, experiment.name);

    const record: RunRecord = { experiment: experiment.name, month, restartSource, outputDir, status: 'pending' };
    const context = { experiment: experiment.name, month };
    let scratchTouched = false;
    let archiving = false;

    try {
      if (outputExists) {
        this.logger.info('Overwriting existing output', { ...context, outputDir });
        await rm(outputDir, { recursive: true, force: true });
      }

      scratchTouched = true;
      await this.prepareScratch(experiment, restartSource, diagTableText);
      record.status = 'prepared';
      this.logger.info('Prepared run directory', { ...context, runDir: layout.runDir, restart: restartSource.kind });

      const startedMs = this.clock.nowMs();
      record.status = 'running';
      record.startedAt = isoTimestamp(startedMs);
      this.logger.info('Starting run', { ...context, command: plan.command, args: plan.args });

      const result = await this.launch(experiment, record, plan, options);
      const finishedMs = this.clock.nowMs();
      record.finishedAt = isoTimestamp(finishedMs);
      const elapsed = Duration.fromMillis(Math.max(0, finishedMs - startedMs)).toFormat('hh:mm:ss');

      if (result.status === 'cancelled') {
        record.status = 'interrupted';
        this.logger.warn('Run interrupted; scratch discarded, no restart written', { ...context, elapsed });
        return { status: 'interrupted', record };
      }

      if (result.exitCode !== 0) {
        throw new ExecutionError(
          `${experiment.executable} exited with code ${result.exitCode}`,
          { exitCode: result.exitCode },
          { ...context, lastProgress: record.lastProgress }
        );
      }

      const restartArchive = restartArchivePath(layout, month);
      archiving = true;
      const stateFiles = await createRestartArchive(layout.restartStagingDir, restartArchive);
      this.logger.info('Wrote restart archive', { ...context, restartArchive, files: stateFiles.length });

      const archived = await archiveRunOutput({
        layout,
        month,
        policy: options.archivePolicy ?? 'full',
        restartArchive,
        logger: this.logger,
      });

      record.status = 'completed';
      this.logger.info('Run completed', { ...context, elapsed, outputDir });
      return {
        status: 'completed',
        record,
        outputDir: archived.outputDir,
        restartArchive,
        prunedMonth: archived.prunedMonth,
      };
    } catch (error) {
      record.status = 'failed';
      record.finishedAt ??= isoTimestamp(this.clock.nowMs());
      record.error = errorMessage(error);
      this.logger.error('Run failed', error, { ...context, lastProgress: record.lastProgress });
      if (archiving) {
        await this.rollBackArchives(experiment, month);
      }
      throw error;
    } finally {
      if (scratchTouched) {
        await resetDir(layout.runDir);
      }
    }
  }

  /**
   * Remove the restart archive and output of a month whose archival failed.
   * Both were absent (or removed for overwriting) before this run started.
   */
  private async rollBackArchives(experiment: Experiment, month: number): Promise<void> {
    const targets = [restartArchivePath(experiment.layout, month), outputDirFor(experiment.layout, month)];
    for (const target of targets) {
      try {
        await rm(target, { recursive: true, force: true });
      } catch (rollbackError) {
        this.logger.error('Could not remove archive of failed run', rollbackError, {
          experiment: experiment.name,
          month,
          target,
        });
      }
    }
  }

  private async resolveRestart(experiment: Experiment, month: number, options: RunOptions): Promise<RestartSource> {
    if (options.restartFile !== undefined) {
      if (!(await pathExists(options.restartFile))) {
        throw new DependencyError(`Restart file ${options.restartFile} does not exist`, {
          experiment: experiment.name,
          month,
          restartFile: options.restartFile,
        });
      }
      return { kind: 'explicit', path: options.restartFile };
    }

    if (!(options.useRestart ?? true)) {
      return { kind: 'cold' };
    }

    if (month === 1) {
      throw new DependencyError('Month 1 has no previous month to restart from; run it cold', {
        experiment: experiment.name,
        month,
      });
    }

    const path = restartArchivePath(experiment.layout, month - 1);
    if (!(await pathExists(path))) {
      throw new DependencyError(`Restart for month ${month - 1} not found at ${path}`, {
        experiment: experiment.name,
        month,
        restartFile: path,
      });
    }
    return { kind: 'previous-month', path, month: month - 1 };
  }

  private async prepareScratch(experiment: Experiment, restart: RestartSource, diagTableText: string): Promise<void> {
    const { layout } = experiment;
    await resetDir(layout.runDir);
    await mkdir(layout.inputDir, { recursive: true });
    await mkdir(layout.restartStagingDir, { recursive: true });
    await mkdir(layout.restartDir, { recursive: true });

    await writeNamelistFile(experiment.namelist, join(layout.runDir, 'input.nml'));
    await writeFile(join(layout.runDir, 'diag_table'), diagTableText, 'utf8');

    const fieldTable = join(layout.runDir, 'field_table');
    if (experiment.fieldTablePath !== undefined) {
      await this.stage(experiment.fieldTablePath, fieldTable, 'fieldTablePath');
    } else {
      await writeFile(fieldTable, '', 'utf8');
    }

    for (const file of experiment.inputFiles) {
      await this.stage(file, join(layout.inputDir, basename(file)), 'inputFiles');
    }

    if (restart.kind !== 'cold') {
      await extractRestartArchive(restart.path, layout.inputDir);
    }
  }

  private async stage(source: string, dest: string, configKey: string): Promise<void> {
    try {
      await copyFile(source, dest);
    } catch (error) {
      throw new ConfigurationError(`Cannot stage ${source} (${errorMessage(error)})`, configKey, { source });
    }
  }

  private async launch(
    experiment: Experiment,
    record: RunRecord,
    plan: ReturnType<typeof buildLaunchPlan>,
    options: RunOptions
  ): Promise<LaunchResult> {
    if (options.signal?.aborted) {
      return { status: 'cancelled' };
    }

    try {
      return await this.launcher.launch({
        command: plan.command,
        args: plan.args,
        cwd: experiment.layout.runDir,
        env: plan.env,
        signal: options.signal,
        onLine: (line) => this.handleLine(line, record, options),
      });
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new ExecutionError(`Monitoring ${experiment.executable} failed: ${errorMessage(error)}`, {}, {
        experiment: experiment.name,
        month: record.month,
      });
    }
  }

  private handleLine(line: string, record: RunRecord, options: RunOptions): void {
    this.logger.debug(line, { experiment: record.experiment, month: record.month });

    const event = parseProgressLine(line);
    if (event === null) {
      return;
    }
    record.lastProgress = event;
    this.logger.info(`Integration completed through ${describeProgress(event)}`, {
      experiment: record.experiment,
      month: record.month,
    });

    if (options.onProgress) {
      try {
        options.onProgress(event, record);
      } catch (error) {
        this.logger.warn('Progress callback failed', { experiment: record.experiment, error: errorMessage(error) });
      }
    }
  }
}
