/**
 * @gcmrun/core - Experiment configuration and run model
 *
 * Namelists, diag tables, experiments and their directory layout, the run
 * lifecycle types, progress parsing, and the ports implemented by adapters.
 */

// Namelist
export * from './namelist/types.js';
export { Namelist, normalizeName } from './namelist/namelist.js';
export { parseNamelist } from './namelist/parser.js';
export { serializeNamelist, formatScalar, formatValue } from './namelist/serializer.js';
export { buildNamelist, readNamelistFile, writeNamelistFile } from './namelist/store.js';

// Diag table
export * from './diag-table/diag-table.js';
export { renderDiagTable, isCalendarEnabled } from './diag-table/render.js';

// Experiment
export * from './experiment/layout.js';
export * from './experiment/experiment.js';

// Runs
export * from './run/types.js';
export * from './progress/progress-parser.js';

// Ports
export * from './ports/index.js';
