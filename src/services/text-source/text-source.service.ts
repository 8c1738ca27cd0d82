import fs from 'fs';
import path from 'path';
import { Logger } from '../logger/logger.service';
import {
    MIN_TEXT_LENGTH,
    MIN_WORD_LENGTH,
    SYSTEM_DICTIONARY_PATH,
    TextCorpus,
    TextSourceKind,
    TextSourceUnavailableError
} from './text-source.types';

export const DEFAULT_DATA_DIR = path.join(__dirname, '..', '..', '..', 'data');

const wordPattern = /^[a-z]+$/;

/**
 * Reads the bundled word list and excerpts. Missing or malformed bundled data
 * is a packaging defect, so this throws rather than falling back.
 */
export function loadTextCorpus(dataDir: string = DEFAULT_DATA_DIR): TextCorpus {
    const commonWords = fs.readFileSync(path.join(dataDir, 'common-words.txt'), 'utf8')
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0);

    const parsed: unknown = JSON.parse(fs.readFileSync(path.join(dataDir, 'excerpts.json'), 'utf8'));
    if (! Array.isArray(parsed) || parsed.length === 0 || ! parsed.every((e): e is string => typeof e === 'string' && e.length > 0)) {
        throw new Error(`Expected a non-empty array of strings in ${path.join(dataDir, 'excerpts.json')}`);
    }

    return Object.freeze({
        commonWords: Object.freeze(commonWords),
        excerpts: Object.freeze(parsed)
    });
}

export function filterWords(lines: readonly string[], maxWordLength: number): string[] {
    return lines
        .map(line => line.trim())
        .filter(word => word.length >= MIN_WORD_LENGTH && word.length <= maxWordLength && wordPattern.test(word));
}

export class TextSourceService
{
    constructor(
        private logger: Logger,
        private corpus: TextCorpus,
        private random: () => number = Math.random,
        private dictionaryPath: string = SYSTEM_DICTIONARY_PATH
    )
    {
    }

    /**
     * Builds the target text for a session. Word sources that are missing or
     * filter down to nothing fall back to the bundled excerpts.
     */
    public generate(source: TextSourceKind, maxWordLength: number): string {
        switch (source) {
        case TextSourceKind.Google:
            return this.fromWordsOrBuiltin(filterWords(this.corpus.commonWords, maxWordLength), 'bundled word list');
        case TextSourceKind.System:
            return this.generateFromSystemDictionary(maxWordLength);
        case TextSourceKind.Builtin:
            return this.generateBuiltin();
        }
    }

    public generateBuiltin(): string {
        return this.assemble(this.corpus.excerpts);
    }

    private generateFromSystemDictionary(maxWordLength: number): string {
        let words: string[];
        try {
            words = filterWords(this.loadSystemDictionary(), maxWordLength);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            this.logger.warn(`Could not load dictionary from ${this.dictionaryPath}: ${reason}. Using built-in texts.`);
            return this.generateBuiltin();
        }
        return this.fromWordsOrBuiltin(words, this.dictionaryPath);
    }

    private loadSystemDictionary(): string[] {
        let content: string;
        try {
            content = fs.readFileSync(this.dictionaryPath, 'utf8');
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new TextSourceUnavailableError(reason);
        }
        return content.split('\n');
    }

    private fromWordsOrBuiltin(words: string[], sourceName: string): string {
        if (words.length === 0) {
            this.logger.warn(`No usable words found in ${sourceName}. Using built-in texts.`);
            return this.generateBuiltin();
        }
        return this.assemble(words);
    }

    // Joins randomly chosen tokens with single spaces until the text is long enough
    private assemble(tokens: readonly string[]): string {
        let text = '';
        while (text.length < MIN_TEXT_LENGTH) {
            const index = Math.min(tokens.length - 1, Math.floor(this.random() * tokens.length));
            if (text.length > 0)
                text += ' ';
            text += tokens[index];
        }
        return text;
    }
}
