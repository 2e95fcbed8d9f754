import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError, DependencyError, ExecutionError, NotFoundError } from '@gcmrun/utils';
import { exitCodeFor, formatError, handleError } from '../../src/core/error-handler.js';

vi.mock('@gcmrun/utils', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@gcmrun/utils')>()),
  handleError: vi.fn(),
}));

describe('formatError', () => {
  it('appends the code of application errors', () => {
    expect(formatError(new NotFoundError('Experiment', 'hs'))).toBe("Experiment with identifier 'hs' not found [NOT_FOUND]");
  });

  it('uses the message of plain errors', () => {
    expect(formatError(new Error('disk full'))).toBe('disk full');
  });

  it('passes strings through', () => {
    expect(formatError('stopped')).toBe('stopped');
  });

  it('falls back for anything else', () => {
    expect(formatError({ reason: 'x' })).toBe('An unexpected error occurred');
  });
});

describe('handleError', () => {
  it('returns the user-facing message', () => {
    expect(handleError(new Error('disk full'), { command: 'run' })).toBe('disk full');
  });
});

describe('exitCodeFor', () => {
  it('reports configuration and dependency errors with 2', () => {
    expect(exitCodeFor(new ConfigurationError('GCM_WORK must be set', 'GCM_WORK'), false)).toBe(2);
    expect(exitCodeFor(new DependencyError('Restart for month 1 not found'), false)).toBe(2);
  });

  it('reports other failures with 1', () => {
    expect(exitCodeFor(new ExecutionError('gcm.x exited with code 3'), false)).toBe(1);
    expect(exitCodeFor(new Error('disk full'), false)).toBe(1);
  });

  it('reports 130 once interrupted', () => {
    expect(exitCodeFor(new ExecutionError('gcm.x exited with code 3'), true)).toBe(130);
  });
});
