import { Keystroke } from '../services/session/session-engine.types';
import { TextSourceKind } from '../services/text-source/text-source.types';

export interface IDisposable {
    dispose(): void;
}

export enum TerminalPhase {
    Typing = 'typing',
    Results = 'results'
}

export type TerminalCommand =
    { type: 'quit' } |
    { type: 'restart' } |
    { type: 'keystroke', keystroke: Keystroke };

export interface TypingSessionConfig {
    durationSeconds: number;
    requireCorrection: boolean;
    textSource: TextSourceKind;
    maxWordLength: number;
}

// Loop cadence while typing and on the results screen
export const TYPING_POLL_INTERVAL_MS = 50;
export const RESULTS_POLL_INTERVAL_MS = 100;

export const ENTER_ALTERNATE_SCREEN = '\u001b[?1049h';
export const LEAVE_ALTERNATE_SCREEN = '\u001b[?1049l';
export const HIDE_CURSOR = '\u001b[?25l';
export const SHOW_CURSOR = '\u001b[?25h';
