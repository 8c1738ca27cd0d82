export type Keystroke =
    { kind: 'char', char: string } |
    { kind: 'backspace' };

export interface SessionOptions {
    durationSeconds: number;
    correctionMode: boolean;
}

/**
 * Read-only view of a session handed to the rendering layer
 */
export type SessionSnapshot = Readonly<{
    targetChars: readonly string[];
    typedEcho: readonly string[];
    cursor: number;
    correctionMarks: readonly boolean[];
    totalKeystrokes: number;
    totalErrors: number;
    started: boolean;
    finished: boolean;
    correctionMode: boolean;
    durationSeconds: number;
    elapsedMs: number;
    remainingMs: number;
    currentWpm: number;
    accuracy: number;
}>
