import { TextSourceKind } from '../text-source/text-source.types';

export class ConfigurationError extends Error {
    constructor(message?: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export type KeystrideConfigSchema = {
    duration: number;
    requireCorrection: boolean;
    textSource: string;
    maxWordLength: number;
    historyPath?: string;
}

export interface SessionDefaults {
    durationSeconds: number;
    requireCorrection: boolean;
    textSource: TextSourceKind;
    maxWordLength: number;
}

export const HISTORY_FILENAME = '.keystride_history.csv';
