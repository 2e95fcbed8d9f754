/**
 * Restart archives
 *
 * The state files a run leaves in run/RESTART (`*.res*`) are packed into
 * a single tar archive per month. The archive is written under a temporary
 * name and renamed into place, so an interrupted write never leaves a
 * restart that looks valid.
 */

import { mkdir, readdir, rename, rm } from 'fs/promises';
import { create, extract } from 'tar';
import { ExecutionError } from '@gcmrun/utils';

const STATE_FILE = /\.res/;

export async function listRestartStateFiles(stagingDir: string): Promise<string[]> {
  const entries = await readdir(stagingDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && STATE_FILE.test(entry.name))
    .map((entry) => entry.name)
    .sort();
}

export async function createRestartArchive(stagingDir: string, archivePath: string): Promise<string[]> {
  const files = await listRestartStateFiles(stagingDir);
  if (files.length === 0) {
    throw new ExecutionError('Run finished without writing any restart state files', {}, { stagingDir });
  }

  const partial = `${archivePath}.partial`;
  try {
    await create({ file: partial, cwd: stagingDir, portable: true }, files);
    await rename(partial, archivePath);
  } catch (error) {
    await rm(partial, { force: true });
    throw error;
  }
  return files;
}

export async function extractRestartArchive(archivePath: string, destDir: string): Promise<void> {
  await mkdir(destDir, { recursive: true });
  await extract({ file: archivePath, cwd: destDir });
}
