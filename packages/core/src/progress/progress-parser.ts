/**
 * Progress parsing for executable output
 *
 * Best-effort only: a line that matches neither pattern yields null, and
 * nothing here ever throws or influences a run's outcome.
 */

export type ProgressEvent =
  | { kind: 'elapsed-days'; days: number }
  | { kind: 'elapsed-date'; date: string };

const ELAPSED_DAYS = /Integration completed through\s+([0-9]+) days/;
// The number before the first ':' is the hour when minutes follow it, otherwise the day
const ELAPSED_DATE = /Integration completed through\s+([\w\s]+?)\s+([0-9]+):([0-9]{2})?/;

export function parseProgressLine(line: string): ProgressEvent | null {
  const text = line.trim();

  const days = ELAPSED_DAYS.exec(text);
  if (days?.[1] !== undefined) {
    return { kind: 'elapsed-days', days: Number.parseInt(days[1], 10) };
  }

  const date = ELAPSED_DATE.exec(text);
  if (date?.[1] !== undefined && date[2] !== undefined) {
    const prefix = date[1].trim();
    return { kind: 'elapsed-date', date: date[3] === undefined ? `${prefix} ${date[2]}` : prefix };
  }

  return null;
}

export function describeProgress(event: ProgressEvent): string {
  return event.kind === 'elapsed-days' ? `${event.days} days` : event.date;
}
