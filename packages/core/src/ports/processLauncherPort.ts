/**
 * Process Launcher Port
 *
 * Runs the external executable and streams its combined output line by line.
 * Adapters kill the child themselves when monitoring fails or the signal fires.
 */

export interface LaunchRequest {
  command: string;
  args: string[];
  cwd: string;
  /** Added to the parent environment */
  env: Record<string, string>;
  /** Aborting kills the child; the launch then resolves as cancelled */
  signal?: AbortSignal;
  /** Called for every stdout/stderr line, in arrival order */
  onLine: (line: string) => void;
}

export type LaunchResult =
  | { status: 'exited'; exitCode: number }
  | { status: 'cancelled' };

export interface ProcessLauncherPort {
  /**
   * Resolves once the child has terminated. A non-zero exit code is a
   * result, not a rejection; rejections mean the child could not be
   * started or monitored.
   */
  launch(request: LaunchRequest): Promise<LaunchResult>;
}
