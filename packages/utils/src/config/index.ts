/**
 * Configuration loading from environment variables
 *
 * Produces the explicit runner configuration handed to the run controller.
 * Nothing here is cached at module level; callers load once at their
 * composition root and pass the object down.
 */

import { hostname } from 'os';
import { isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export interface RunnerConfig {
  /** Model source tree root (GCM_BASE) */
  baseDir: string;
  /** Root for per-experiment working areas (GCM_WORK) */
  workDir: string;
  /** Root for archived run output (GCM_DATA) */
  dataDir: string;
  /** Machine environment profile name (GCM_ENV) */
  envProfile: string;
  /** Shell file that sets up the machine environment for the executable */
  envSource: string;
  /** MPI launcher command (GCM_MPIRUN) */
  mpiLauncher: string;
}

const nonEmpty = (name: string) =>
  z
    .string({ required_error: `${name} must be set` })
    .trim()
    .min(1, `${name} must not be empty`);

const RunnerEnvSchema = z.object({
  GCM_BASE: nonEmpty('GCM_BASE'),
  GCM_WORK: nonEmpty('GCM_WORK'),
  GCM_DATA: nonEmpty('GCM_DATA'),
  GCM_ENV: z.string().trim().min(1).optional(),
  GCM_MPIRUN: z.string().trim().min(1).optional(),
});

export type RunnerEnv = z.infer<typeof RunnerEnvSchema>;

function absolute(dir: string): string {
  return isAbsolute(dir) ? dir : resolve(dir);
}

/**
 * Load runner configuration from environment variables
 *
 * GCM_BASE, GCM_WORK and GCM_DATA are required. GCM_ENV falls back to the
 * host name, GCM_MPIRUN to `mpirun`.
 */
export function getRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = RunnerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    const msg = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigurationError(`Invalid runner environment: ${msg}`, keys[0], { keys });
  }

  const { GCM_BASE, GCM_WORK, GCM_DATA, GCM_ENV, GCM_MPIRUN } = parsed.data;
  const baseDir = absolute(GCM_BASE);
  const envProfile = GCM_ENV ?? hostname();

  return {
    baseDir,
    workDir: absolute(GCM_WORK),
    dataDir: absolute(GCM_DATA),
    envProfile,
    envSource: join(baseDir, 'src', 'extra', 'env', envProfile),
    mpiLauncher: GCM_MPIRUN ?? 'mpirun',
  };
}
