import { performance } from 'perf_hooks';

/**
 * Source of timestamps in microseconds. Readings must never decrease.
 */
export interface Clock {
  now(): number;
}

// performance.now() is monotonic; anchoring it to timeOrigin keeps readings
// comparable across scopes and threads of the same process.
export const steadyClock: Clock = {
  now: () => (performance.timeOrigin + performance.now()) * 1000,
};
