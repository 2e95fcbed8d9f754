/**
 * Output archival
 *
 * Moves a finished run's results from the scratch directory into the
 * experiment's permanent tree under run<NNN>. Files are copied into
 * run<NNN>.partial and renamed into place, so run<NNN> only ever exists
 * complete.
 */

import { basename, join } from 'path';
import { copyFile, cp, mkdir, readdir, rename, rm } from 'fs/promises';
import type { ArchivePolicy, ExperimentLayout, LoggerPort } from '@gcmrun/core';
import { outputDirFor, restartArchivePath } from '@gcmrun/core';

/** Months of restarts kept under the light policy */
export const LIGHT_RESTART_RETENTION = 2;

export interface ArchiveOutputParams {
  layout: ExperimentLayout;
  month: number;
  policy: ArchivePolicy;
  restartArchive: string;
  logger: LoggerPort;
}

export interface ArchiveOutputResult {
  outputDir: string;
  copied: string[];
  prunedMonth?: number;
}

async function primaryResultFiles(runDir: string): Promise<string[]> {
  const entries = await readdir(runDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.nc'))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Drop the restart archive of a month that fell out of the retention
 * window, along with the copy archived next to its output
 */
export async function pruneRestart(layout: ExperimentLayout, month: number): Promise<void> {
  const archive = restartArchivePath(layout, month);
  await rm(archive, { force: true });
  await rm(join(outputDirFor(layout, month), basename(archive)), { force: true });
}

async function copyRunOutput(
  layout: ExperimentLayout,
  policy: ArchivePolicy,
  restartArchive: string,
  destDir: string
): Promise<string[]> {
  if (policy === 'full') {
    // Restart state already lives in the archive
    await rm(layout.restartStagingDir, { recursive: true, force: true });
    await cp(layout.runDir, destDir, { recursive: true, preserveTimestamps: true });
    return readdir(destDir);
  }

  const results = await primaryResultFiles(layout.runDir);
  for (const file of results) {
    await copyFile(join(layout.runDir, file), join(destDir, file));
  }
  await copyFile(restartArchive, join(destDir, basename(restartArchive)));
  return [...results, basename(restartArchive)];
}

export async function archiveRunOutput(params: ArchiveOutputParams): Promise<ArchiveOutputResult> {
  const { layout, month, policy, restartArchive, logger } = params;
  const outputDir = outputDirFor(layout, month);
  const partialDir = `${outputDir}.partial`;

  let copied: string[];
  try {
    await rm(partialDir, { recursive: true, force: true });
    await mkdir(partialDir, { recursive: true });
    copied = await copyRunOutput(layout, policy, restartArchive, partialDir);
    await rename(partialDir, outputDir);
  } catch (error) {
    await rm(partialDir, { recursive: true, force: true });
    throw error;
  }

  if (policy === 'full') {
    logger.info('Archived run directory', { month, outputDir, entries: copied.length });
    return { outputDir, copied };
  }

  const prunedMonth = month - LIGHT_RESTART_RETENTION;
  if (prunedMonth >= 1) {
    await pruneRestart(layout, prunedMonth);
    logger.info('Pruned restart outside retention window', { month, prunedMonth });
  }

  logger.info('Archived primary results', { month, outputDir, copied });
  return { outputDir, copied, prunedMonth: prunedMonth >= 1 ? prunedMonth : undefined };
}
