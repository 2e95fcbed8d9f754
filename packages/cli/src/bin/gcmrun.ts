#!/usr/bin/env tsx

/**
 * gcmrun CLI Entry Point
 *
 * SIGINT/SIGTERM abort the current run: the child is killed, its scratch
 * discarded, and the process exits with 130 once cleanup is done. A second
 * signal exits immediately.
 */

import { logger } from '@gcmrun/utils';
import { EXIT_INTERRUPTED, exitCodeFor, handleError } from '../core/error-handler.js';
import { createProgram } from '../program.js';

const abort = new AbortController();

function onSignal(signal: NodeJS.Signals): void {
  if (abort.signal.aborted) {
    process.exit(EXIT_INTERRUPTED);
  }
  logger.warn('Interrupt received, stopping the current run', { signal });
  abort.abort();
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

const program = createProgram({ signal: abort.signal });

async function main(): Promise<void> {
  try {
    await program.parseAsync();
    if (abort.signal.aborted) {
      process.exitCode = EXIT_INTERRUPTED;
    }
  } catch (error) {
    const message = handleError(error, { argv: process.argv.slice(2) });
    console.error(`Error: ${message}`);
    process.exitCode = exitCodeFor(error, abort.signal.aborted);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
