/**
 * Experiment
 * ==========
 * One named run series: its namelist, diag table, inputs, executable binding
 * and directory layout. An experiment owns its scratch run directory and its
 * restart directory; runs against it are strictly sequential by month.
 */

import { access, readFile } from 'fs/promises';
import { join } from 'path';
import type { RunnerConfig } from '@gcmrun/utils';
import { CompilationInputError, ConfigurationError } from '@gcmrun/utils';
import { DiagTable } from '../diag-table/diag-table.js';
import { Namelist } from '../namelist/namelist.js';
import { buildNamelist } from '../namelist/store.js';
import type { NamelistPatch, NamelistValue } from '../namelist/types.js';
import { resolveExperimentLayout, type ExperimentLayout } from './layout.js';

export const DEFAULT_EXECUTABLE = 'gcm.x';
export const DEFAULT_MISSING_FILE_TOLERANCE = 3;

export interface ExperimentOptions {
  namelist?: Namelist;
  diagTable?: DiagTable;
  /** Compilation inputs, relative to `<source>/src` */
  pathNames?: string[];
  /** `checkPathNames` fails once this many inputs are missing; -1 disables the check */
  missingFileTolerance?: number;
  /** Extra files copied into the run's INPUT directory */
  inputFiles?: string[];
  fieldTablePath?: string;
  executable?: string;
  /** Use another experiment's executable directory */
  execDir?: string;
  overwriteData?: boolean;
  debug?: boolean;
}

export interface CreateExperimentOptions extends Omit<ExperimentOptions, 'namelist' | 'pathNames'> {
  /** Namelist sources merged in order */
  namelistSources?: string[];
  /** File listing one compilation input per line */
  pathNamesFile?: string;
  namelistPatch?: NamelistPatch;
}

export interface PathNamesCheck {
  kept: string[];
  missing: string[];
}

export class Experiment {
  readonly name: string;
  readonly config: RunnerConfig;
  readonly layout: ExperimentLayout;
  readonly debug: boolean;
  namelist: Namelist;
  diagTable: DiagTable;
  pathNames: string[];
  missingFileTolerance: number;
  inputFiles: string[];
  fieldTablePath?: string;
  executable: string;
  overwriteData: boolean;

  constructor(name: string, config: RunnerConfig, options: ExperimentOptions = {}) {
    this.name = name;
    this.config = config;
    this.debug = options.debug ?? false;
    this.layout = resolveExperimentLayout(name, config, { debug: this.debug, execDir: options.execDir });
    this.namelist = options.namelist ?? new Namelist();
    this.diagTable = options.diagTable ?? new DiagTable();
    this.pathNames = [...(options.pathNames ?? [])];
    this.missingFileTolerance = options.missingFileTolerance ?? DEFAULT_MISSING_FILE_TOLERANCE;
    this.inputFiles = [...(options.inputFiles ?? [])];
    this.fieldTablePath = options.fieldTablePath;
    this.executable = options.executable ?? DEFAULT_EXECUTABLE;
    this.overwriteData = options.overwriteData ?? false;
  }

  get executablePath(): string {
    return join(this.layout.execDir, this.executable);
  }

  /**
   * Attach a diag table; the experiment keeps its own copy
   */
  useDiagTable(table: DiagTable): this {
    this.diagTable = table.copy();
    return this;
  }

  updateNamelist(patch: NamelistPatch): this {
    this.namelist.update(patch);
    return this;
  }

  setNamelistValue(section: string, key: string, value: NamelistValue): this {
    this.namelist.set(section, key, value);
    return this;
  }

  /**
   * New experiment sharing this one's executable, with copies of its
   * namelist, diag table and inputs
   */
  derive(name: string): Experiment {
    return new Experiment(name, this.config, {
      namelist: this.namelist.clone(),
      diagTable: this.diagTable.copy(),
      pathNames: this.pathNames,
      missingFileTolerance: this.missingFileTolerance,
      inputFiles: this.inputFiles,
      fieldTablePath: this.fieldTablePath,
      executable: this.executable,
      execDir: this.layout.execDir,
      overwriteData: this.overwriteData,
      debug: this.debug,
    });
  }

  /**
   * Check compilation inputs against a source tree. Missing inputs are
   * dropped from `pathNames` unless there are too many of them.
   */
  async checkPathNames(sourceDir: string = this.config.baseDir): Promise<PathNamesCheck> {
    const kept: string[] = [];
    const missing: string[] = [];

    for (const pathName of this.pathNames) {
      try {
        await access(join(sourceDir, 'src', pathName));
        kept.push(pathName);
      } catch {
        missing.push(pathName);
      }
    }

    const tolerance = this.missingFileTolerance;
    if (tolerance >= 0 && missing.length >= tolerance && missing.length > 0) {
      throw new CompilationInputError(missing, tolerance);
    }

    this.pathNames = kept;
    return { kept, missing };
  }
}

export async function readPathNames(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read path_names file (${reason})`, 'pathNamesFile', { path });
  }
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

/**
 * Build an experiment from its namelist sources and compilation input list
 */
export async function createExperiment(
  name: string,
  config: RunnerConfig,
  options: CreateExperimentOptions = {}
): Promise<Experiment> {
  const { namelistSources, pathNamesFile, namelistPatch, ...rest } = options;
  const namelist = await buildNamelist(namelistSources ?? []);
  if (namelistPatch) {
    namelist.update(namelistPatch);
  }
  const pathNames = pathNamesFile ? await readPathNames(pathNamesFile) : [];
  return new Experiment(name, config, { ...rest, namelist, pathNames });
}
