export enum SpeedBand {
    Fastest = 'fastest',
    Fast = 'fast',
    Medium = 'medium',
    Slow = 'slow',
    Slowest = 'slowest',
    NoData = 'no-data',
    Unused = 'unused'
}

export enum AccuracyBand {
    Highest = 'highest',
    High = 'high',
    Medium = 'medium',
    Low = 'low',
    Lowest = 'lowest',
    NoData = 'no-data',
    Unused = 'unused'
}

export type BandThreshold<T> = Readonly<{
    bound: number;
    band: T;
}>

// Relative position between the fastest (0) and slowest (1) mean latency,
// matched when position < bound
export const SPEED_BAND_THRESHOLDS: readonly BandThreshold<SpeedBand>[] = [
    { bound: 0.16, band: SpeedBand.Fastest },
    { bound: 0.33, band: SpeedBand.Fast },
    { bound: 0.67, band: SpeedBand.Medium },
    { bound: 0.83, band: SpeedBand.Slow },
    { bound: Infinity, band: SpeedBand.Slowest }
];

// Accuracy fraction, matched when accuracy >= bound
export const ACCURACY_BAND_THRESHOLDS: readonly BandThreshold<AccuracyBand>[] = [
    { bound: 0.95, band: AccuracyBand.Highest },
    { bound: 0.85, band: AccuracyBand.High },
    { bound: 0.70, band: AccuracyBand.Medium },
    { bound: 0.50, band: AccuracyBand.Low },
    { bound: -Infinity, band: AccuracyBand.Lowest }
];
