import { performance } from 'perf_hooks';

/**
 * Monotonic clock in milliseconds. The engine never reads wall-clock time so
 * that latency samples are unaffected by system clock adjustments.
 */
export interface TimeSource {
    now(): number;
}

export const systemTimeSource: TimeSource = {
    now: () => performance.now()
};
