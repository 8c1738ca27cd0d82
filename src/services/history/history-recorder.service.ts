import fs from 'fs';
import { Logger } from '../logger/logger.service';
import { SessionEngine } from '../session/session-engine';
import { HISTORY_HEADER, HistoryRecord, HistoryWriteError } from './history-recorder.types';

export function buildHistoryRecord(
    engine: SessionEngine,
    textSource: string,
    maxWordLength: number,
    recordedAt: Date = new Date()
) : HistoryRecord
{
    return {
        timestamp: Math.floor(recordedAt.getTime() / 1000),
        durationSeconds: engine.durationSeconds,
        avgWpm: engine.wpmSampler.average(),
        peakWpm: engine.wpmSampler.peak(),
        accuracy: engine.currentAccuracy(),
        charactersTyped: engine.getCursor(),
        errors: engine.getTotalErrors(),
        correctionMode: engine.correctionMode,
        textSource: textSource,
        maxWordLength: maxWordLength
    };
}

export function formatHistoryLine(record: HistoryRecord) : string
{
    return [
        record.timestamp,
        record.durationSeconds,
        record.avgWpm.toFixed(2),
        record.peakWpm.toFixed(2),
        record.accuracy.toFixed(2),
        record.charactersTyped,
        record.errors,
        record.correctionMode,
        record.textSource,
        record.maxWordLength
    ].join(',');
}

export function parseHistoryLine(line: string) : HistoryRecord | undefined
{
    const fields = line.trim().split(',');
    if (fields.length !== 10 || fields.some(f => f.trim() === ''))
        return undefined;

    const [timestamp, duration, avgWpm, peakWpm, accuracy, charactersTyped, errors, correctionMode, textSource, maxWordLength] = fields;
    const numbers = [timestamp, duration, avgWpm, peakWpm, accuracy, charactersTyped, errors, maxWordLength].map(Number);
    if (numbers.some(n => Number.isNaN(n)) || (correctionMode !== 'true' && correctionMode !== 'false'))
        return undefined;

    return {
        timestamp: Number(timestamp),
        durationSeconds: Number(duration),
        avgWpm: Number(avgWpm),
        peakWpm: Number(peakWpm),
        accuracy: Number(accuracy),
        charactersTyped: Number(charactersTyped),
        errors: Number(errors),
        correctionMode: correctionMode === 'true',
        textSource: textSource,
        maxWordLength: Number(maxWordLength)
    };
}

/**
 * Append-only CSV log of completed sessions. The header is written only when
 * the file is created; earlier lines are never rewritten.
 */
export class HistoryRecorderService
{
    constructor(private historyPath: string, private logger: Logger)
    {
    }

    public get path(): string {
        return this.historyPath;
    }

    public append(record: HistoryRecord): void {
        try {
            const lines: string[] = [];
            if (! fs.existsSync(this.historyPath))
                lines.push(HISTORY_HEADER);
            lines.push(formatHistoryLine(record));

            fs.appendFileSync(this.historyPath, lines.map(l => `${l}\n`).join(''));
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new HistoryWriteError(`Failed to save session history to ${this.historyPath}: ${reason}`);
        }
        this.logger.debug(`Recorded session history in ${this.historyPath}`);
    }

    public readAll(): HistoryRecord[] {
        if (! fs.existsSync(this.historyPath))
            return [];

        const records: HistoryRecord[] = [];
        const lines = fs.readFileSync(this.historyPath, 'utf8').split('\n');
        lines.forEach((line, index) => {
            if (line.trim().length === 0 || line.trim() === HISTORY_HEADER)
                return;

            const record = parseHistoryLine(line);
            if (record) {
                records.push(record);
            } else {
                this.logger.debug(`Skipping malformed history line ${index + 1}`);
            }
        });
        return records;
    }
}
