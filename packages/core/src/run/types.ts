/**
 * Run lifecycle types
 *
 *   pending -> prepared -> running -> completed | failed | interrupted
 *
 * One RunRecord per invocation. Records are not persisted; the restart
 * archives on disk are the only state that outlives the process.
 */

import type { ProgressEvent } from '../progress/progress-parser.js';

export type RunStatus = 'pending' | 'prepared' | 'running' | 'completed' | 'failed' | 'interrupted';

export type RestartSource =
  | { kind: 'cold' }
  | { kind: 'explicit'; path: string }
  | { kind: 'previous-month'; path: string; month: number };

/**
 * full: archive the whole scratch directory
 * light: archive primary results and the restart only, keeping restarts
 *        for the two most recent months
 */
export type ArchivePolicy = 'full' | 'light';

export interface RunRecord {
  experiment: string;
  month: number;
  restartSource: RestartSource;
  outputDir: string;
  status: RunStatus;
  startedAt?: string;
  finishedAt?: string;
  lastProgress?: ProgressEvent;
  error?: string;
}

export interface RunOptions {
  /** Start from the previous month's restart (default true) */
  useRestart?: boolean;
  /** Explicit restart archive; bypasses the month - 1 lookup */
  restartFile?: string;
  numCores?: number;
  multiNode?: boolean;
  overwriteData?: boolean;
  archivePolicy?: ArchivePolicy;
  debug?: boolean;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent, record: Readonly<RunRecord>) => void;
}

export type RunOutcome =
  | { status: 'completed'; record: RunRecord; outputDir: string; restartArchive: string; prunedMonth?: number }
  | { status: 'skipped'; reason: 'output-exists'; month: number; outputDir: string }
  | { status: 'interrupted'; record: RunRecord };
