export interface HistoryRecord {
    /**
     * Unix time in seconds when the session was recorded
     */
    timestamp: number;
    durationSeconds: number;
    avgWpm: number;
    peakWpm: number;

    /**
     * Accuracy percentage in [0, 100]
     */
    accuracy: number;

    /**
     * Final cursor position, i.e. characters advanced through
     */
    charactersTyped: number;
    errors: number;
    correctionMode: boolean;
    textSource: string;
    maxWordLength: number;
}

export const HISTORY_HEADER = 'timestamp,duration_seconds,avg_wpm,peak_wpm,accuracy,characters_typed,errors,correction_mode,text_source,max_word_length';

export class HistoryWriteError extends Error {
    constructor(message?: string) {
        super(message);
        this.name = 'HistoryWriteError';
    }
}
