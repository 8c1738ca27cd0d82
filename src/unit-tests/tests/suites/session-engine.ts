import { SessionEngine } from '../../../services/session/session-engine';
import { Keystroke } from '../../../services/session/session-engine.types';
import { FakeClock } from '../utils/test-utils';

const char = (c: string): Keystroke => ({ kind: 'char', char: c });
const backspace: Keystroke = { kind: 'backspace' };

function typeAll(engine: SessionEngine, keys: string) {
    for (const c of keys) {
        engine.applyKeystroke(char(c));
    }
}

export const sessionEngineSuite = () => {
    describe('session engine suite', () => {
        let clock: FakeClock;

        beforeEach(() => {
            clock = new FakeClock(1000);
        });

        test('normal mode advances past a mistake and marks it', () => {
            const engine = new SessionEngine('abc', { durationSeconds: 30, correctionMode: false }, clock);
            typeAll(engine, 'axc');

            expect(engine.getCursor()).toBe(3);
            expect(engine.getTotalErrors()).toBe(1);
            expect(engine.getTotalKeystrokes()).toBe(3);
            expect(engine.getCorrectionMarks()).toEqual([false, true, false]);
            expect(engine.getTypedEcho()).toBe('axc');
            expect(engine.isFinished()).toBe(true);
        });

        test('correction mode holds the cursor until the expected character is typed', () => {
            const engine = new SessionEngine('ab', { durationSeconds: 30, correctionMode: true }, clock);

            engine.applyKeystroke(char('x'));
            expect(engine.getCursor()).toBe(0);
            expect(engine.getTypedEcho()).toBe('');

            typeAll(engine, 'ab');

            expect(engine.getCursor()).toBe(2);
            expect(engine.getTotalErrors()).toBe(1);
            expect(engine.getTotalKeystrokes()).toBe(3);
            expect(engine.getCorrectionMarks()).toEqual([true, false]);
            expect(engine.isFinished()).toBe(true);
            expect(engine.keyMetrics.get('a')?.errors).toBe(1);
            expect(engine.keyMetrics.get('a')?.latencies).toHaveLength(2);
        });

        test('backspace moves back without erasing analytics', () => {
            const engine = new SessionEngine('ab', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(char('a'));
            engine.applyKeystroke(backspace);

            expect(engine.getCursor()).toBe(0);
            expect(engine.getTypedEcho()).toBe('');
            expect(engine.getTotalErrors()).toBe(0);
            expect(engine.getTotalKeystrokes()).toBe(2);
            expect(engine.keyMetrics.get('a')?.latencies).toEqual([0]);
        });

        test('backspace keeps correction marks and error counts', () => {
            const engine = new SessionEngine('abc', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(char('x'));
            engine.applyKeystroke(backspace);
            engine.applyKeystroke(char('a'));

            expect(engine.getCursor()).toBe(1);
            expect(engine.getTotalErrors()).toBe(1);
            expect(engine.getTotalKeystrokes()).toBe(3);
            expect(engine.getCorrectionMarks()).toEqual([true, false, false]);
            expect(engine.getTypedEcho()).toBe('a');
        });

        test('backspace on an empty echo only starts the session', () => {
            const engine = new SessionEngine('ab', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(backspace);
            clock.advance(500);

            expect(engine.getTotalKeystrokes()).toBe(0);
            expect(engine.getCursor()).toBe(0);
            expect(engine.elapsedMs()).toBe(500);
        });

        test('tickTimeout finishes the session at the configured duration', () => {
            const engine = new SessionEngine('abcdef', { durationSeconds: 30, correctionMode: false }, clock);
            engine.tickTimeout(clock.now() + 60000);
            expect(engine.isFinished()).toBe(false);

            engine.applyKeystroke(char('a'));
            engine.tickTimeout(1000 + 29999);
            expect(engine.isFinished()).toBe(false);

            engine.tickTimeout(1000 + 30000);
            expect(engine.isFinished()).toBe(true);
            expect(engine.getCursor()).toBe(1);
        });

        test('keystrokes after finishing are ignored', () => {
            const engine = new SessionEngine('ab', { durationSeconds: 30, correctionMode: false }, clock);
            typeAll(engine, 'ab');
            engine.applyKeystroke(char('z'));
            engine.applyKeystroke(backspace);

            expect(engine.getCursor()).toBe(2);
            expect(engine.getTotalKeystrokes()).toBe(2);
            expect(engine.getTypedEcho()).toBe('ab');
        });

        test('accuracy is 100 before any keystroke and follows the error ratio after', () => {
            const engine = new SessionEngine('abc', { durationSeconds: 30, correctionMode: false }, clock);
            expect(engine.currentAccuracy()).toBe(100);

            typeAll(engine, 'axc');
            expect(engine.currentAccuracy()).toBeCloseTo(66.667, 3);
        });

        test('latency is measured from when the position became current', () => {
            const engine = new SessionEngine('abc', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(char('a'));
            clock.advance(250);
            engine.applyKeystroke(char('b'));
            clock.advance(75);
            engine.applyKeystroke(char('c'));

            expect(engine.keyMetrics.get('a')?.latencies).toEqual([0]);
            expect(engine.keyMetrics.get('b')?.latencies).toEqual([250]);
            expect(engine.keyMetrics.get('c')?.latencies).toEqual([75]);
        });

        test('a wrong attempt in correction mode does not restart the key timer', () => {
            const engine = new SessionEngine('ab', { durationSeconds: 30, correctionMode: true }, clock);
            engine.applyKeystroke(char('a'));
            clock.advance(100);
            engine.applyKeystroke(char('x'));
            clock.advance(100);
            engine.applyKeystroke(char('b'));

            expect(engine.keyMetrics.get('b')?.latencies).toEqual([100, 200]);
            expect(engine.keyMetrics.get('b')?.errors).toBe(1);
        });

        test('a wrong attempt in normal mode restarts the timer for the next position', () => {
            const engine = new SessionEngine('abc', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(char('a'));
            clock.advance(100);
            engine.applyKeystroke(char('x'));
            clock.advance(50);
            engine.applyKeystroke(char('c'));

            expect(engine.keyMetrics.get('b')?.latencies).toEqual([100]);
            expect(engine.keyMetrics.get('b')?.errors).toBe(1);
            expect(engine.keyMetrics.get('c')?.latencies).toEqual([50]);
        });

        test('errors are keyed by the expected character, not the typed one', () => {
            const engine = new SessionEngine('ab', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(char('z'));

            expect(engine.keyMetrics.get('a')?.errors).toBe(1);
            expect(engine.keyMetrics.get('z')).toBeUndefined();
        });

        test('correct keystrokes feed the wpm sampler', () => {
            const engine = new SessionEngine('aaaaaaaaaa', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(char('a'));
            clock.advance(2000);
            engine.applyKeystroke(char('a'));
            expect(engine.wpmSampler.current()).toBeCloseTo(12, 6);

            clock.advance(500);
            engine.applyKeystroke(char('a'));
            clock.advance(500);
            engine.applyKeystroke(char('a'));

            expect(engine.wpmSampler.samples()).toHaveLength(2);
            expect(engine.wpmSampler.current()).toBeCloseTo(16, 6);
            expect(engine.snapshot().currentWpm).toBeCloseTo(16, 6);
        });

        test('keystrokes one second apart both produce wpm readings', () => {
            const engine = new SessionEngine('aaaaaaaaaa', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(char('a'));
            clock.advance(3004);
            engine.applyKeystroke(char('a'));
            clock.advance(1000);
            engine.applyKeystroke(char('a'));

            expect(engine.wpmSampler.samples().map(s => s.elapsedSeconds)).toEqual([3.004, 4.004]);
        });

        test('a mistake in normal mode advances without sampling wpm', () => {
            const engine = new SessionEngine('abcdef', { durationSeconds: 30, correctionMode: false }, clock);
            engine.applyKeystroke(char('a'));
            clock.advance(2000);
            engine.applyKeystroke(char('x'));

            expect(engine.getCursor()).toBe(2);
            expect(engine.wpmSampler.samples()).toHaveLength(0);
        });

        test('snapshots are frozen copies', () => {
            const engine = new SessionEngine('abc', { durationSeconds: 30, correctionMode: false }, clock);
            const before = engine.snapshot();
            engine.applyKeystroke(char('x'));

            expect(Object.isFrozen(before)).toBe(true);
            expect(before.correctionMarks).toEqual([false, false, false]);
            expect(before.typedEcho).toEqual([]);
            expect(before.started).toBe(false);
            expect(engine.snapshot().correctionMarks).toEqual([true, false, false]);
        });

        test('remaining time counts down from the configured duration', () => {
            const engine = new SessionEngine('abc', { durationSeconds: 30, correctionMode: false }, clock);
            expect(engine.remainingMs()).toBe(30000);

            engine.applyKeystroke(char('a'));
            clock.advance(10000);
            expect(engine.snapshot().elapsedMs).toBe(10000);
            expect(engine.snapshot().remainingMs).toBe(20000);
        });

        test('target text is split by code point', () => {
            const engine = new SessionEngine('né\u{1F600}', { durationSeconds: 30, correctionMode: false }, clock);
            expect(engine.getCorrectionMarks()).toHaveLength(3);

            typeAll(engine, 'né\u{1F600}');
            expect(engine.isFinished()).toBe(true);
            expect(engine.getTotalErrors()).toBe(0);
        });

        test('cursor, marks and counters stay in bounds for any keystroke sequence', () => {
            const target = 'the quick brown fox';
            const pool: Keystroke[] = [char('t'), char('h'), char('e'), char(' '), char('q'), char('z'), backspace];

            for (const correctionMode of [false, true]) {
                const engine = new SessionEngine(target, { durationSeconds: 30, correctionMode }, clock);
                // Small linear congruential generator for a repeatable sequence
                let seed = 7;
                for (let i = 0; i < 400; i++) {
                    seed = (seed * 75 + 74) % 65537;
                    const expectedBefore = target[engine.getCursor()];
                    const cursorBefore = engine.getCursor();
                    const keystroke = pool[seed % pool.length];
                    engine.applyKeystroke(keystroke);

                    expect(engine.getCursor()).toBeGreaterThanOrEqual(0);
                    expect(engine.getCursor()).toBeLessThanOrEqual(target.length);
                    expect(engine.getTotalErrors()).toBeLessThanOrEqual(engine.getTotalKeystrokes());
                    expect(engine.getCorrectionMarks()).toHaveLength(target.length);

                    if (correctionMode && keystroke.kind === 'char' && ! engine.isFinished()) {
                        const advanced = engine.getCursor() === cursorBefore + 1;
                        expect(advanced).toBe(keystroke.char === expectedBefore);
                    }
                }
            }
        });
    });
};
