/**
 * Ports Barrel Export
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock } from './clockPort.js';
export type { LaunchRequest, LaunchResult, ProcessLauncherPort } from './processLauncherPort.js';
export type { LoggerPort } from './loggerPort.js';
