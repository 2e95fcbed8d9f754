export interface ClockPort {
  nowMs(): number;
}

/**
 * System clock adapter; tests inject a fixed clock instead
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}
