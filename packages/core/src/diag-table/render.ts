/**
 * Diag table rendering
 *
 * Produces the diagnostic output specification read by the executable:
 *
 *   "<title>"
 *   0001 1 1 0 0 0                       (0 0 0 0 0 0 without a calendar)
 *   #output files
 *   "daily", 1, "days", 1, "days", "time",
 *   #diagnostic field entries
 *   "dynamics", "ps", "ps", "daily", "all", .false., "none", 2,
 */

import { ConfigurationError } from '@gcmrun/utils';
import type { Namelist } from '../namelist/namelist.js';
import type { DiagTable } from './diag-table.js';

const CALENDAR_BASE_DATE = '0001 1 1 0 0 0';
const NO_CALENDAR_BASE_DATE = '0 0 0 0 0 0';

/**
 * The calendar is on unless `main_nml.calendar` explicitly says `no_calendar`
 */
export function isCalendarEnabled(namelist: Namelist): boolean {
  const calendar = namelist.getOptional('main_nml', 'calendar');
  return !(typeof calendar === 'string' && calendar.trim().toLowerCase().startsWith('no_calendar'));
}

const quote = (value: string | number): string => `"${value}"`;

export function renderDiagTable(table: DiagTable, namelist: Namelist, title: string = 'gcmrun'): string {
  if (table.size === 0) {
    throw new ConfigurationError('No output files defined in the diag table', 'diagTable');
  }

  const files = table.outputFiles();
  const lines: string[] = [
    quote(title),
    isCalendarEnabled(namelist) ? CALENDAR_BASE_DATE : NO_CALENDAR_BASE_DATE,
    '',
    '#output files',
  ];

  for (const file of files) {
    lines.push(`${quote(file.name)}, ${file.frequency}, ${quote(file.unit)}, 1, ${quote(file.timeUnit)}, "time",`);
  }

  lines.push('', '#diagnostic field entries');
  for (const file of files) {
    for (const field of file.fields) {
      const average = field.timeAverage ? '.true.' : '.false.';
      lines.push(
        `${quote(field.module)}, ${quote(field.name)}, ${quote(field.name)}, ${quote(file.name)}, "all", ${average}, "none", 2,`
      );
    }
  }

  lines.push('');
  return lines.join('\n');
}
