/**
 * Config Loader - Experiment and sweep files in YAML or JSON
 *
 * Relative paths inside an experiment file are resolved against the
 * directory holding the file, so experiment directories can be moved
 * around as a unit.
 */

import { readFile } from 'fs/promises';
import { dirname, extname, isAbsolute, resolve } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { Experiment } from '@gcmrun/core';
import { DiagTable, DiagTableSpecSchema, createExperiment } from '@gcmrun/core';
import type { SweepValues } from '@gcmrun/workflows';
import type { RunnerConfig } from '@gcmrun/utils';
import { ValidationError } from '@gcmrun/utils';

/**
 * Detect config format by file extension
 */
export function detectConfigFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  return 'json';
}

const NamelistScalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);
const NamelistValueSchema = z.union([NamelistScalarSchema, z.array(NamelistScalarSchema).min(1)]);

export const ExperimentFileSchema = z.object({
  name: z.string().min(1),
  namelistSources: z.array(z.string().min(1)).default([]),
  namelist: z.record(z.record(NamelistValueSchema)).default({}),
  diagTable: DiagTableSpecSchema.default({}),
  inputFiles: z.array(z.string().min(1)).default([]),
  fieldTable: z.string().min(1).optional(),
  executable: z.string().min(1).optional(),
  execDir: z.string().min(1).optional(),
  pathNamesFile: z.string().min(1).optional(),
  missingFileTolerance: z.number().int().min(-1).optional(),
  overwriteData: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type ExperimentFile = z.infer<typeof ExperimentFileSchema>;

/** section -> parameter -> values */
export const SweepFileSchema = z
  .record(z.record(z.array(NamelistValueSchema).min(1)))
  .refine((values) => Object.keys(values).length > 0, 'Sweep file defines no parameters');

/**
 * Read a YAML or JSON file whose top level must be an object
 */
export async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const format = detectConfigFormat(configPath);
  let parsed: unknown;
  try {
    const fileContent = await readFile(configPath, 'utf-8');
    parsed = format === 'yaml' ? yaml.load(fileContent) : JSON.parse(fileContent);
  } catch (error) {
    throw new ValidationError(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath }
    );
  }

  const record = z.record(z.unknown()).safeParse(parsed);
  if (!record.success) {
    throw new ValidationError(`${format.toUpperCase()} config must be an object`, { configPath, format });
  }
  return record.data;
}

async function loadValidated<S extends z.ZodTypeAny>(configPath: string, schema: S): Promise<z.output<S>> {
  const configData = await readConfigFile(configPath);
  const parsed = schema.safeParse(configData);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Config validation failed: ${issues}`, {
      configPath,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export async function loadExperimentFile(configPath: string): Promise<ExperimentFile> {
  return loadValidated(configPath, ExperimentFileSchema);
}

export async function loadSweepFile(configPath: string): Promise<SweepValues> {
  return loadValidated(configPath, SweepFileSchema);
}

/**
 * Load an experiment file and build the Experiment it describes
 */
export async function loadExperiment(configPath: string, config: RunnerConfig): Promise<Experiment> {
  const file = await loadExperimentFile(configPath);
  const baseDir = dirname(resolve(configPath));
  const fromConfigDir = (path: string): string => (isAbsolute(path) ? path : resolve(baseDir, path));
  const optionalPath = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : fromConfigDir(path);

  const experiment = await createExperiment(file.name, config, {
    namelistSources: file.namelistSources.map(fromConfigDir),
    namelistPatch: file.namelist,
    pathNamesFile: optionalPath(file.pathNamesFile),
    missingFileTolerance: file.missingFileTolerance,
    inputFiles: file.inputFiles.map(fromConfigDir),
    fieldTablePath: optionalPath(file.fieldTable),
    executable: file.executable,
    execDir: optionalPath(file.execDir),
    overwriteData: file.overwriteData,
    debug: file.debug,
  });
  return experiment.useDiagTable(DiagTable.fromSpec(file.diagTable));
}
