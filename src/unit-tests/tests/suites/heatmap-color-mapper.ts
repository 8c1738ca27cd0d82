import { KeyMetricsTracker } from '../../../services/key-metrics/key-metrics-tracker';
import { HeatmapColorMapper } from '../../../services/heatmap/heatmap-color-mapper';
import { AccuracyBand, SpeedBand } from '../../../services/heatmap/heatmap-color-mapper.types';

export const heatmapColorMapperSuite = () => {
    describe('heatmap color mapper suite', () => {
        test('characters never seen are unused', () => {
            const mapper = new HeatmapColorMapper(new KeyMetricsTracker());

            expect(mapper.speedBand('q')).toBe(SpeedBand.Unused);
            expect(mapper.accuracyBand('q')).toBe(AccuracyBand.Unused);
        });

        test('speed needs at least two characters with samples', () => {
            const tracker = new KeyMetricsTracker();
            tracker.recordAttempt('a', 120);
            const mapper = new HeatmapColorMapper(tracker);

            expect(mapper.speedBand('a')).toBe(SpeedBand.NoData);
        });

        test('speed has no data when every mean is equal', () => {
            const tracker = new KeyMetricsTracker();
            tracker.recordAttempt('a', 100);
            tracker.recordAttempt('b', 100);
            const mapper = new HeatmapColorMapper(tracker);

            expect(mapper.speedBand('a')).toBe(SpeedBand.NoData);
            expect(mapper.speedBand('b')).toBe(SpeedBand.NoData);
        });

        test('characters with only errors have no data for either map', () => {
            const tracker = new KeyMetricsTracker();
            tracker.recordAttempt('a', 100);
            tracker.recordAttempt('b', 200);
            tracker.recordError('z');
            const mapper = new HeatmapColorMapper(tracker);

            expect(mapper.speedBand('z')).toBe(SpeedBand.NoData);
            expect(mapper.accuracyBand('z')).toBe(AccuracyBand.NoData);
        });

        test('speed bands follow the relative position between fastest and slowest', () => {
            const tracker = new KeyMetricsTracker();
            const means: Record<string, number> = { a: 0, b: 100, c: 10, d: 16, e: 33, f: 50, g: 75, h: 83 };
            for (const [char, latency] of Object.entries(means)) {
                tracker.recordAttempt(char, latency);
            }
            const mapper = new HeatmapColorMapper(tracker);

            expect(mapper.speedBand('a')).toBe(SpeedBand.Fastest);
            expect(mapper.speedBand('c')).toBe(SpeedBand.Fastest);
            expect(mapper.speedBand('d')).toBe(SpeedBand.Fast);
            expect(mapper.speedBand('e')).toBe(SpeedBand.Medium);
            expect(mapper.speedBand('f')).toBe(SpeedBand.Medium);
            expect(mapper.speedBand('g')).toBe(SpeedBand.Slow);
            expect(mapper.speedBand('h')).toBe(SpeedBand.Slowest);
            expect(mapper.speedBand('b')).toBe(SpeedBand.Slowest);
        });

        test('accuracy bands follow the fraction of clean attempts', () => {
            const tracker = new KeyMetricsTracker();
            const errorsPerChar: Record<string, number> = { a: 0, b: 1, c: 2, d: 3, e: 6, f: 10, g: 11 };
            for (const [char, errors] of Object.entries(errorsPerChar)) {
                for (let i = 0; i < 20; i++) {
                    tracker.recordAttempt(char, 100);
                }
                for (let i = 0; i < errors; i++) {
                    tracker.recordError(char);
                }
            }
            const mapper = new HeatmapColorMapper(tracker);

            expect(mapper.accuracyBand('a')).toBe(AccuracyBand.Highest);
            expect(mapper.accuracyBand('b')).toBe(AccuracyBand.Highest);
            expect(mapper.accuracyBand('c')).toBe(AccuracyBand.High);
            expect(mapper.accuracyBand('d')).toBe(AccuracyBand.High);
            expect(mapper.accuracyBand('e')).toBe(AccuracyBand.Medium);
            expect(mapper.accuracyBand('f')).toBe(AccuracyBand.Low);
            expect(mapper.accuracyBand('g')).toBe(AccuracyBand.Lowest);
        });

        test('bands reflect the tracker as it changes', () => {
            const tracker = new KeyMetricsTracker();
            tracker.recordAttempt('a', 100);
            const mapper = new HeatmapColorMapper(tracker);
            expect(mapper.speedBand('a')).toBe(SpeedBand.NoData);

            tracker.recordAttempt('b', 300);
            expect(mapper.speedBand('a')).toBe(SpeedBand.Fastest);
            expect(mapper.speedBand('b')).toBe(SpeedBand.Slowest);
        });
    });
};
