import { max, min } from 'lodash';
import { KeyMetricsTracker } from '../key-metrics/key-metrics-tracker';
import {
    ACCURACY_BAND_THRESHOLDS,
    AccuracyBand,
    SPEED_BAND_THRESHOLDS,
    SpeedBand
} from './heatmap-color-mapper.types';

/**
 * Classifies characters into heatmap bands from the tracker's current state.
 * Nothing is cached; every call reflects the tracker as it is now.
 */
export class HeatmapColorMapper
{
    constructor(private tracker: KeyMetricsTracker)
    {
    }

    public speedBand(char: string): SpeedBand {
        if (! this.tracker.get(char))
            return SpeedBand.Unused;

        const charMean = this.tracker.meanLatency(char);
        if (charMean === undefined)
            return SpeedBand.NoData;

        // Need at least two characters to rank against each other
        const allMeans = this.tracker.meanLatencies();
        const fastest = min(allMeans);
        const slowest = max(allMeans);
        if (allMeans.length < 2 || fastest === undefined || slowest === undefined)
            return SpeedBand.NoData;

        const range = slowest - fastest;
        if (range === 0)
            return SpeedBand.NoData;

        const relativePosition = (charMean - fastest) / range;
        const match = SPEED_BAND_THRESHOLDS.find(t => relativePosition < t.bound);
        return match ? match.band : SpeedBand.Slowest;
    }

    public accuracyBand(char: string): AccuracyBand {
        if (! this.tracker.get(char))
            return AccuracyBand.Unused;

        const accuracy = this.tracker.accuracy(char);
        if (accuracy === undefined)
            return AccuracyBand.NoData;

        const match = ACCURACY_BAND_THRESHOLDS.find(t => accuracy >= t.bound);
        return match ? match.band : AccuracyBand.Lowest;
    }
}
