/**
 * Namelist Serializer
 *
 * Writes one `&group ... /` block per section, four-space indented,
 * with a blank line between groups.
 */

import type { Namelist } from './namelist.js';
import type { NamelistScalar, NamelistValue } from './types.js';

export function formatScalar(value: NamelistScalar): string {
  if (typeof value === 'boolean') {
    return value ? '.true.' : '.false.';
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return `'${value.replace(/'/g, "''")}'`;
}

export function formatValue(value: NamelistValue): string {
  return Array.isArray(value) ? value.map(formatScalar).join(', ') : formatScalar(value);
}

export function serializeNamelist(namelist: Namelist): string {
  const lines: string[] = [];
  for (const section of namelist.sectionNames()) {
    lines.push(`&${section}`);
    for (const [key, value] of Object.entries(namelist.section(section))) {
      lines.push(`    ${key} = ${formatValue(value)}`);
    }
    lines.push('/');
    lines.push('');
  }
  return lines.join('\n');
}
