/**
 * Run lock
 *
 * One run at a time per experiment. The lock is a file created with
 * exclusive-create semantics, plus an in-process registry so two runs
 * started from the same process collide before touching the filesystem.
 * A lock whose recorded PID is no longer alive is reclaimed; any other
 * existing lock makes acquisition fail immediately.
 */

import { mkdir, open, readFile, unlink } from 'fs/promises';
import { dirname } from 'path';
import { RunInProgressError } from '@gcmrun/utils';
import { isErrnoException } from './fs-helpers.js';

export interface RunLockHandle {
  lockPath: string;
  release(): Promise<void>;
}

interface LockFileContent {
  experiment: string;
  pid: number;
  startedAt: string;
}

const heldLocks = new Set<string>();

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

async function readHolderPid(lockPath: string): Promise<number | undefined> {
  try {
    const content: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (typeof content === 'object' && content !== null && 'pid' in content && typeof content.pid === 'number') {
      return content.pid;
    }
  } catch {
    // Unreadable or half-written lock: treated as held
  }
  return undefined;
}

async function createLockFile(lockPath: string, content: LockFileContent): Promise<boolean> {
  try {
    const handle = await open(lockPath, 'wx');
    try {
      await handle.writeFile(JSON.stringify(content, null, 2));
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

export async function acquireRunLock(experiment: string, lockPath: string): Promise<RunLockHandle> {
  if (heldLocks.has(lockPath)) {
    throw new RunInProgressError(experiment, lockPath, process.pid);
  }
  heldLocks.add(lockPath);

  try {
    await mkdir(dirname(lockPath), { recursive: true });
    const content: LockFileContent = { experiment, pid: process.pid, startedAt: new Date().toISOString() };

    if (!(await createLockFile(lockPath, content))) {
      const holderPid = await readHolderPid(lockPath);
      if (holderPid === undefined || isProcessAlive(holderPid)) {
        throw new RunInProgressError(experiment, lockPath, holderPid);
      }
      // Stale lock left by a dead process
      await unlink(lockPath);
      if (!(await createLockFile(lockPath, content))) {
        throw new RunInProgressError(experiment, lockPath);
      }
    }
  } catch (error) {
    heldLocks.delete(lockPath);
    throw error;
  }

  let released = false;
  return {
    lockPath,
    release: async () => {
      if (released) return;
      released = true;
      heldLocks.delete(lockPath);
      try {
        await unlink(lockPath);
      } catch (error) {
        if (!(isErrnoException(error) && error.code === 'ENOENT')) {
          throw error;
        }
      }
    },
  };
}
