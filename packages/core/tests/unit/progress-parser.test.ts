import { describe, expect, it } from 'vitest';
import { describeProgress, parseProgressLine } from '../../src/progress/progress-parser.js';

describe('parseProgressLine', () => {
  it('reads elapsed days', () => {
    expect(parseProgressLine('Integration completed through 30 days')).toEqual({ kind: 'elapsed-days', days: 30 });
  });

  it('reads an elapsed date', () => {
    expect(parseProgressLine('  Integration completed through    January 31 2000 00:00:00')).toEqual({
      kind: 'elapsed-date',
      date: 'January 31 2000',
    });
  });

  it('keeps the day when no time follows it', () => {
    expect(parseProgressLine('Integration completed through January 15: elapsed 42s')).toEqual({
      kind: 'elapsed-date',
      date: 'January 15',
    });
    expect(describeProgress({ kind: 'elapsed-date', date: 'January 15' })).toBe('January 15');
  });

  it('ignores other lines', () => {
    expect(parseProgressLine('NOTE: MPP_DOMAINS_SET_STACK_SIZE: stack size set to 32768.')).toBeNull();
    expect(parseProgressLine('')).toBeNull();
    expect(parseProgressLine('Integration completed through')).toBeNull();
  });

  it('describes events', () => {
    expect(describeProgress({ kind: 'elapsed-days', days: 12 })).toBe('12 days');
    expect(describeProgress({ kind: 'elapsed-date', date: 'February 1 2000' })).toBe('February 1 2000');
  });
});
