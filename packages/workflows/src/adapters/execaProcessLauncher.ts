/**
 * Execa Process Launcher
 *
 * ProcessLauncherPort adapter on execa. Output is consumed incrementally
 * (no buffering of the whole stream); stdout and stderr are interleaved in
 * arrival order.
 */

import { execa } from 'execa';
import type { LaunchRequest, LaunchResult, ProcessLauncherPort } from '@gcmrun/core';
import { ExecutionError } from '@gcmrun/utils';

export interface ExecaProcessLauncherOptions {
  /** Grace period between SIGTERM and SIGKILL on cancellation */
  killGraceMs?: number;
}

export class ExecaProcessLauncher implements ProcessLauncherPort {
  private readonly killGraceMs: number;

  constructor(options: ExecaProcessLauncherOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? 5000;
  }

  async launch(request: LaunchRequest): Promise<LaunchResult> {
    const subprocess = execa(request.command, request.args, {
      cwd: request.cwd,
      env: request.env,
      stdin: 'ignore',
      all: true,
      buffer: false,
      reject: false,
      cancelSignal: request.signal,
      forceKillAfterDelay: this.killGraceMs,
    });

    let callbackError: unknown;
    let streamError: unknown;
    try {
      for await (const line of subprocess.iterable({ from: 'all' })) {
        try {
          request.onLine(line);
        } catch (error) {
          callbackError = error;
          break;
        }
      }
    } catch (error) {
      streamError = error;
    }

    if (callbackError !== undefined) {
      subprocess.kill();
      await subprocess;
      throw callbackError;
    }

    const result = await subprocess;

    if (result.isCanceled || request.signal?.aborted) {
      return { status: 'cancelled' };
    }
    if (result.exitCode === undefined) {
      throw new ExecutionError(result.shortMessage ?? `Failed to start ${request.command}`, {
        signal: result.signal,
      });
    }
    if (streamError !== undefined && result.exitCode === 0) {
      const reason = streamError instanceof Error ? streamError.message : String(streamError);
      throw new ExecutionError(`Lost the output stream of ${request.command}: ${reason}`, {
        exitCode: result.exitCode,
      });
    }
    return { status: 'exited', exitCode: result.exitCode };
  }
}
