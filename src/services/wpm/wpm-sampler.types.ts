export interface WpmSample {
    elapsedSeconds: number;
    wpm: number;
}

// No sample is taken before this many seconds have elapsed
export const INITIAL_WPM_DELAY_SECONDS = 2.0;
export const WPM_UPDATE_INTERVAL_SECONDS = 1.0;
export const CHARS_PER_WORD = 5.0;
export const MAX_WPM_CAP = 500.0;

// Elapsed seconds come from millisecond readings divided by 1000, so gap
// checks allow for rounding in the subtraction
export const ELAPSED_EPSILON_SECONDS = 1e-9;
