/**
 * Injectable clock. Pipeline timings are epoch milliseconds taken from a
 * `Clock` so tests can drive them deterministically.
 */

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export function toIsoString(epochMs: number): string {
  return new Date(epochMs).toISOString();
}
