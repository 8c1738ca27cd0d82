import readline, { Key } from 'readline';
import { BehaviorSubject, interval, Observable, Subscription } from 'rxjs';
import { switchMap, tap } from 'rxjs/operators';
import termSize from 'term-size';
import { HeatmapColorMapper } from '../services/heatmap/heatmap-color-mapper';
import { buildHistoryRecord, HistoryRecorderService } from '../services/history/history-recorder.service';
import { HistoryWriteError } from '../services/history/history-recorder.types';
import { Logger } from '../services/logger/logger.service';
import { SessionEngine } from '../services/session/session-engine';
import { systemTimeSource, TimeSource } from '../services/session/time-source';
import { TextSourceService } from '../services/text-source/text-source.service';
import { renderSummaryScreen, renderTypingScreen } from './render';
import {
    IDisposable,
    RESULTS_POLL_INTERVAL_MS,
    TerminalCommand,
    TerminalPhase,
    TYPING_POLL_INTERVAL_MS,
    TypingSessionConfig
} from './terminal.types';

/**
 * Maps a readline keypress to a terminal command. Returns undefined for keys
 * the trainer ignores (arrows, tab, function keys, other control chords).
 */
export function toTerminalCommand(str: string | undefined, key: Key | undefined) : TerminalCommand | undefined
{
    if (key?.ctrl && key.name === 'c')
        return { type: 'quit' };
    if (key?.name === 'escape')
        return { type: 'quit' };
    if (key?.name === 'return' || key?.name === 'enter')
        return { type: 'restart' };
    if (key?.name === 'backspace')
        return { type: 'keystroke', keystroke: { kind: 'backspace' } };
    if (key?.ctrl || key?.meta)
        return undefined;

    if (str !== undefined && Array.from(str).length === 1 && str >= ' ' && str !== '\u007f')
        return { type: 'keystroke', keystroke: { kind: 'char', char: str } };

    return undefined;
}

export class TypingTerminal implements IDisposable
{
    private engine: SessionEngine;
    private historyWarning: string | undefined;
    private loopSubscription: Subscription | undefined;

    private phaseStream: BehaviorSubject<TerminalPhase> = new BehaviorSubject<TerminalPhase>(TerminalPhase.Typing);
    public phase: Observable<TerminalPhase> = this.phaseStream.asObservable();
    private terminalRunningStream: BehaviorSubject<boolean> = new BehaviorSubject<boolean>(true);
    public terminalRunning: Observable<boolean> = this.terminalRunningStream.asObservable();

    constructor(
        private logger: Logger,
        private textSourceService: TextSourceService,
        private historyRecorder: HistoryRecorderService,
        private sessionConfig: TypingSessionConfig,
        private output: NodeJS.WritableStream,
        private clock: TimeSource = systemTimeSource,
        private columns: () => number = () => termSize().columns
    )
    {
        this.engine = this.createEngine();
    }

    public get currentEngine(): SessionEngine {
        return this.engine;
    }

    public get currentPhase(): TerminalPhase {
        return this.phaseStream.value;
    }

    public get lastHistoryWarning(): string | undefined {
        return this.historyWarning;
    }

    /**
     * Starts the render/timeout loop. The period follows the phase: a
     * tighter cadence while typing, a slower one on the results screen.
     */
    public start(): void
    {
        this.loopSubscription = this.phaseStream.pipe(
            switchMap(phase => interval(phase === TerminalPhase.Typing ? TYPING_POLL_INTERVAL_MS : RESULTS_POLL_INTERVAL_MS)),
            tap(() => this.tick())
        ).subscribe({
            error: (error: unknown) => this.terminalRunningStream.error(error)
        });

        this.render();
    }

    public tick(): void
    {
        if (this.phaseStream.value === TerminalPhase.Typing) {
            this.engine.tickTimeout();
            if (this.engine.isFinished())
                this.completeSession();
        }
        this.render();
    }

    public handleCommand(command: TerminalCommand): void
    {
        if (command.type === 'quit') {
            this.logger.debug('Quit requested');
            this.terminalRunningStream.next(false);
            this.terminalRunningStream.complete();
            return;
        }

        if (this.phaseStream.value === TerminalPhase.Typing) {
            if (command.type !== 'keystroke')
                return;
            this.engine.applyKeystroke(command.keystroke);
            if (this.engine.isFinished())
                this.completeSession();
        } else if (command.type === 'restart') {
            this.restart();
        } else {
            // Ignore other keys so the results are not dismissed by accident
            return;
        }

        this.render();
    }

    public abort(error: unknown): void
    {
        this.terminalRunningStream.error(error);
    }

    public render(): void
    {
        const columns = this.columns();
        const frame = this.phaseStream.value === TerminalPhase.Typing
            ? renderTypingScreen(this.engine.snapshot(), columns)
            : renderSummaryScreen({
                snapshot: this.engine.snapshot(),
                keyMetrics: this.engine.keyMetrics,
                wpmSampler: this.engine.wpmSampler,
                heatmap: new HeatmapColorMapper(this.engine.keyMetrics),
                historyWarning: this.historyWarning
            }, columns);

        readline.cursorTo(this.output, 0, 0);
        readline.clearScreenDown(this.output);
        this.output.write(frame);
    }

    public dispose(): void
    {
        if (this.loopSubscription)
            this.loopSubscription.unsubscribe();

        this.phaseStream.complete();
        this.terminalRunningStream.complete();
    }

    private completeSession(): void
    {
        const snapshot = this.engine.snapshot();
        this.logger.info(`Session finished: ${snapshot.cursor} characters, ${snapshot.totalErrors} errors, ${snapshot.accuracy.toFixed(1)}% accuracy`);

        try {
            this.historyRecorder.append(buildHistoryRecord(this.engine, this.sessionConfig.textSource, this.sessionConfig.maxWordLength));
        } catch (e) {
            if (! (e instanceof HistoryWriteError))
                throw e;
            this.logger.warn(e.message);
            this.historyWarning = e.message;
        }

        this.phaseStream.next(TerminalPhase.Results);
    }

    private restart(): void
    {
        this.logger.debug('Restarting session');
        this.engine = this.createEngine();
        this.historyWarning = undefined;
        this.phaseStream.next(TerminalPhase.Typing);
    }

    private createEngine(): SessionEngine
    {
        const text = this.textSourceService.generate(this.sessionConfig.textSource, this.sessionConfig.maxWordLength);
        return new SessionEngine(text, {
            durationSeconds: this.sessionConfig.durationSeconds,
            correctionMode: this.sessionConfig.requireCorrection
        }, this.clock);
    }
}
