import { ConfigurationError } from '../../../services/config/config.service.types';
import { KeyMetricsTracker } from '../../../services/key-metrics/key-metrics-tracker';
import { TextSourceKind } from '../../../services/text-source/text-source.types';
import {
    formatSeconds,
    formatTimestamp,
    getTableOfHistory,
    getTableOfKeyAccuracy,
    getTableOfKeySpeed,
    parseDuration,
    parseMaxWordLength,
    parseTextSource
} from '../../../utils/utils';

export const utilsSuite = () => {
    describe('utils suite', () => {
        test('text sources accept their aliases in any case', () => {
            expect(parseTextSource('google')).toBe(TextSourceKind.Google);
            expect(parseTextSource('Google10K')).toBe(TextSourceKind.Google);
            expect(parseTextSource('dict')).toBe(TextSourceKind.System);
            expect(parseTextSource('DICTIONARY')).toBe(TextSourceKind.System);
            expect(parseTextSource('built-in')).toBe(TextSourceKind.Builtin);
            expect(parseTextSource('samples')).toBe(TextSourceKind.Builtin);
        });

        test('unknown text sources are rejected', () => {
            expect(() => parseTextSource('typewriter')).toThrow(ConfigurationError);
            expect(() => parseTextSource('typewriter')).toThrow("Invalid text source 'typewriter'. Valid options: google, system, builtin");
        });

        test('durations must be positive whole seconds', () => {
            expect(parseDuration(45)).toBe(45);
            expect(parseDuration('60')).toBe(60);
            expect(() => parseDuration(0)).toThrow("Duration must be a positive number of seconds, got '0'");
            expect(() => parseDuration(2.5)).toThrow(ConfigurationError);
            expect(() => parseDuration('soon')).toThrow(ConfigurationError);
        });

        test('word lengths must be between 3 and 20', () => {
            expect(parseMaxWordLength(3)).toBe(3);
            expect(parseMaxWordLength('20')).toBe(20);
            expect(() => parseMaxWordLength(2)).toThrow('Word length must be at least 3');
            expect(() => parseMaxWordLength(21)).toThrow('Word length must be 20 or less');
            expect(() => parseMaxWordLength(-4)).toThrow('Word length must be a positive integer');
        });

        test('timestamps and durations are formatted for display', () => {
            expect(formatTimestamp(0)).toBe('1970-01-01 00:00');
            expect(formatTimestamp(1700000000)).toBe('2023-11-14 22:13');
            expect(formatSeconds(29400)).toBe('29s');
            expect(formatSeconds(29500)).toBe('30s');
        });

        test('key tables show placeholders without data', () => {
            const tracker = new KeyMetricsTracker();

            expect(getTableOfKeySpeed(tracker)).toContain('No data');
            expect(getTableOfKeyAccuracy(tracker)).toContain('No data');
        });

        test('key tables list ranked characters', () => {
            const tracker = new KeyMetricsTracker();
            tracker.recordAttempt('b', 50);
            tracker.recordAttempt('c', 412.4);
            tracker.recordAttempt('c', 412.4);
            tracker.recordError('c');

            const speed = getTableOfKeySpeed(tracker);
            expect(speed).toContain('Fastest Keys');
            expect(speed).toContain('\'b\'');
            expect(speed).toContain('412');

            const accuracy = getTableOfKeyAccuracy(tracker);
            expect(accuracy).toContain('1 errors');
            expect(accuracy).toContain('100%');
            expect(accuracy).toContain('50%');
        });

        test('history table shows one row per record', () => {
            const table = getTableOfHistory([{
                timestamp: 1700000000,
                durationSeconds: 30,
                avgWpm: 42.25,
                peakWpm: 55,
                accuracy: 96.5,
                charactersTyped: 180,
                errors: 6,
                correctionMode: true,
                textSource: 'system',
                maxWordLength: 9
            }]);

            expect(table).toContain('2023-11-14 22:13');
            expect(table).toContain('42.25');
            expect(table).toContain('55.00');
            expect(table).toContain('96.50%');
            expect(table).toContain('yes');
        });
    });
};
