import { KeyMetricsTracker } from '../key-metrics/key-metrics-tracker';
import { WpmSampler } from '../wpm/wpm-sampler';
import { Keystroke, SessionOptions, SessionSnapshot } from './session-engine.types';
import { systemTimeSource, TimeSource } from './time-source';

/**
 * Character-level matching state machine for one typing session. A session is
 * never reset in place; restarting builds a new engine with fresh analytics.
 *
 * In correction mode a mismatch holds the cursor until the expected character
 * is typed. In normal mode every printable keystroke advances the cursor and
 * mismatches are only counted.
 */
export class SessionEngine
{
    public readonly keyMetrics: KeyMetricsTracker = new KeyMetricsTracker();
    public readonly wpmSampler: WpmSampler = new WpmSampler();

    private readonly targetChars: readonly string[];
    private readonly correctionMarks: boolean[];
    private typedEcho: string[] = [];
    private cursor: number = 0;
    private totalKeystrokes: number = 0;
    private totalErrors: number = 0;
    private startedAt: number | undefined;
    private currentKeyStartedAt: number | undefined;
    private finished: boolean = false;

    constructor(
        targetText: string,
        private readonly options: SessionOptions,
        private readonly clock: TimeSource = systemTimeSource
    )
    {
        this.targetChars = Array.from(targetText);
        this.correctionMarks = new Array<boolean>(this.targetChars.length).fill(false);
    }

    public applyKeystroke(input: Keystroke): void {
        if (this.finished)
            return;

        const now = this.clock.now();
        if (this.startedAt === undefined) {
            this.startedAt = now;
            this.startKeyTimer(now);
        }

        if (input.kind === 'char') {
            this.applyCharacter(input.char, now);
        } else {
            this.applyBackspace(now);
        }
    }

    /**
     * Ends the session once the configured duration has elapsed. Must be
     * called on every loop iteration since a learner who stops typing never
     * produces another keystroke.
     */
    public tickTimeout(now: number = this.clock.now()): void {
        if (this.finished || this.startedAt === undefined)
            return;

        if (now - this.startedAt >= this.options.durationSeconds * 1000)
            this.finished = true;
    }

    public isFinished(): boolean {
        return this.finished;
    }

    public getCursor(): number {
        return this.cursor;
    }

    public getTotalErrors(): number {
        return this.totalErrors;
    }

    public getTotalKeystrokes(): number {
        return this.totalKeystrokes;
    }

    public getTypedEcho(): string {
        return this.typedEcho.join('');
    }

    public getCorrectionMarks(): readonly boolean[] {
        return this.correctionMarks;
    }

    public get durationSeconds(): number {
        return this.options.durationSeconds;
    }

    public get correctionMode(): boolean {
        return this.options.correctionMode;
    }

    public currentAccuracy(): number {
        if (this.totalKeystrokes === 0)
            return 100;
        return (this.totalKeystrokes - this.totalErrors) / this.totalKeystrokes * 100;
    }

    public elapsedMs(now: number = this.clock.now()): number {
        if (this.startedAt === undefined)
            return 0;
        return Math.max(0, now - this.startedAt);
    }

    public remainingMs(now: number = this.clock.now()): number {
        return Math.max(0, this.options.durationSeconds * 1000 - this.elapsedMs(now));
    }

    public snapshot(now: number = this.clock.now()): SessionSnapshot {
        return Object.freeze({
            targetChars: this.targetChars,
            typedEcho: [...this.typedEcho],
            cursor: this.cursor,
            correctionMarks: [...this.correctionMarks],
            totalKeystrokes: this.totalKeystrokes,
            totalErrors: this.totalErrors,
            started: this.startedAt !== undefined,
            finished: this.finished,
            correctionMode: this.options.correctionMode,
            durationSeconds: this.options.durationSeconds,
            elapsedMs: this.elapsedMs(now),
            remainingMs: this.remainingMs(now),
            currentWpm: this.wpmSampler.current(),
            accuracy: this.currentAccuracy()
        });
    }

    private applyCharacter(typed: string, now: number): void {
        if (this.cursor >= this.targetChars.length)
            return;

        const expected = this.targetChars[this.cursor];

        // Every attempt is timed against the expected character, right or wrong
        if (this.currentKeyStartedAt !== undefined)
            this.keyMetrics.recordAttempt(expected, now - this.currentKeyStartedAt);

        const matched = typed === expected;

        if (this.options.correctionMode) {
            this.totalKeystrokes += 1;
            if (matched) {
                this.typedEcho.push(typed);
                this.advance(now);
                this.sampleWpm(now);
            } else {
                // Stay on this position until the learner gets it right
                this.markError(expected);
            }
        } else {
            this.typedEcho.push(typed);
            this.totalKeystrokes += 1;
            if (matched) {
                this.advance(now);
                this.sampleWpm(now);
            } else {
                this.markError(expected);
                this.advance(now);
            }
        }

        if (this.cursor === this.targetChars.length)
            this.finished = true;
    }

    private applyBackspace(now: number): void {
        if (this.typedEcho.length === 0)
            return;

        this.typedEcho.pop();
        this.totalKeystrokes += 1;

        // Errors, correction marks and key metrics stay as recorded
        if (this.cursor > 0) {
            this.cursor -= 1;
            this.startKeyTimer(now);
        }
    }

    private markError(expected: string): void {
        this.totalErrors += 1;
        this.keyMetrics.recordError(expected);
        this.correctionMarks[this.cursor] = true;
    }

    private advance(now: number): void {
        this.cursor += 1;
        this.startKeyTimer(now);
    }

    private startKeyTimer(now: number): void {
        this.currentKeyStartedAt = this.cursor < this.targetChars.length ? now : undefined;
    }

    private sampleWpm(now: number): void {
        this.wpmSampler.maybeSample(this.elapsedMs(now) / 1000, this.cursor);
    }
}
