export enum TextSourceKind {
    Google = 'google',
    System = 'system',
    Builtin = 'builtin'
}

export const MIN_TEXT_LENGTH = 500;
export const MIN_WORD_LENGTH = 3;
export const MAX_WORD_LENGTH_LIMIT = 20;
export const SYSTEM_DICTIONARY_PATH = '/usr/share/dict/words';

/**
 * Bundled text material, loaded once at startup
 */
export type TextCorpus = Readonly<{
    commonWords: readonly string[];
    excerpts: readonly string[];
}>

export class TextSourceUnavailableError extends Error {
    constructor(message?: string) {
        super(message);
        this.name = 'TextSourceUnavailable';
    }
}
