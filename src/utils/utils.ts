import Table from 'cli-table3';
import { round } from 'lodash';
import { ConfigurationError } from '../services/config/config.service.types';
import { HistoryRecord } from '../services/history/history-recorder.types';
import { KeyMetricsTracker } from '../services/key-metrics/key-metrics-tracker';
import { RankedKey } from '../services/key-metrics/key-metrics-tracker.types';
import { SessionSnapshot } from '../services/session/session-engine.types';
import { MAX_WORD_LENGTH_LIMIT, MIN_WORD_LENGTH, TextSourceKind } from '../services/text-source/text-source.types';
import { WpmSampler } from '../services/wpm/wpm-sampler';

// Plain tables, colour is applied by the caller where needed
const plainStyle = { head: [], border: [] };

export function parseTextSource(textSource: string) : TextSourceKind
{
    switch (textSource.toLowerCase()) {
    case 'google':
    case 'google10k':
    case 'top10k':
        return TextSourceKind.Google;
    case 'system':
    case 'dict':
    case 'dictionary':
        return TextSourceKind.System;
    case 'builtin':
    case 'built-in':
    case 'samples':
        return TextSourceKind.Builtin;
    default:
        throw new ConfigurationError(`Invalid text source '${textSource}'. Valid options: google, system, builtin`);
    }
}

export function parseDuration(duration: number | string) : number
{
    const value = typeof duration === 'number' ? duration : Number(duration);
    if (! Number.isInteger(value) || value <= 0)
        throw new ConfigurationError(`Duration must be a positive number of seconds, got '${duration}'`);
    return value;
}

export function parseMaxWordLength(maxWordLength: number | string) : number
{
    const value = typeof maxWordLength === 'number' ? maxWordLength : Number(maxWordLength);
    if (! Number.isInteger(value) || value <= 0)
        throw new ConfigurationError('Word length must be a positive integer');
    if (value < MIN_WORD_LENGTH)
        throw new ConfigurationError(`Word length must be at least ${MIN_WORD_LENGTH}`);
    if (value > MAX_WORD_LENGTH_LIMIT)
        throw new ConfigurationError(`Word length must be ${MAX_WORD_LENGTH_LIMIT} or less`);
    return value;
}

export function getTableOfResults(snapshot: SessionSnapshot, wpmSampler: WpmSampler) : string
{
    const table = new Table({ head: ['Results', ''], colWidths: [20, 12], style: plainStyle });

    table.push(
        ['Average WPM', wpmSampler.average().toFixed(1)],
        ['Peak WPM', wpmSampler.peak().toFixed(1)],
        ['Accuracy', `${snapshot.accuracy.toFixed(1)}%`],
        ['Characters Typed', `${snapshot.cursor}`],
        ['Errors', `${snapshot.totalErrors}`],
        ['Test Duration', `${snapshot.durationSeconds}s`]
    );

    return table.toString();
}

export function getTableOfKeySpeed(tracker: KeyMetricsTracker, count: number = 3) : string
{
    const table = new Table({ head: ['Key Speed', 'Time (ms)'], colWidths: [16, 12], style: plainStyle });

    pushRankedRows(table, 'Fastest Keys', tracker.fastest(count), k => `${Math.round(k.value)}`);
    pushRankedRows(table, 'Slowest Keys', tracker.slowest(count), k => `${Math.round(k.value)}`);

    return table.toString();
}

export function getTableOfKeyAccuracy(tracker: KeyMetricsTracker, count: number = 3) : string
{
    const table = new Table({ head: ['Key Accuracy', ''], colWidths: [16, 12], style: plainStyle });

    pushRankedRows(table, 'Problem Keys', tracker.mostErrorProne(count), k => `${k.value} errors`);
    pushRankedRows(table, 'Best Keys', tracker.mostAccurate(count), k => `${Math.round(k.value * 100)}%`);

    return table.toString();
}

export function getTableOfHistory(records: HistoryRecord[]) : string
{
    const header = ['Date', 'Duration', 'Avg WPM', 'Peak WPM', 'Accuracy', 'Chars', 'Errors', 'Correction', 'Source', 'Max Len'];
    const table = new Table({ head: header, style: plainStyle });

    records.forEach(record => {
        table.push([
            formatTimestamp(record.timestamp),
            `${record.durationSeconds}s`,
            record.avgWpm.toFixed(2),
            record.peakWpm.toFixed(2),
            `${record.accuracy.toFixed(2)}%`,
            `${record.charactersTyped}`,
            `${record.errors}`,
            record.correctionMode ? 'yes' : 'no',
            record.textSource,
            `${record.maxWordLength}`
        ]);
    });

    return table.toString();
}

// unix seconds -> 'YYYY-MM-DD HH:MM' in UTC
export function formatTimestamp(unixSeconds: number) : string
{
    return new Date(unixSeconds * 1000).toISOString().slice(0, 16).replace('T', ' ');
}

export function formatSeconds(ms: number) : string
{
    return `${round(ms / 1000)}s`;
}

function pushRankedRows(table: Table.Table, title: string, keys: RankedKey[], formatValue: (key: RankedKey) => string)
{
    table.push([title, '']);
    if (keys.length === 0) {
        table.push(['No data', '-']);
        return;
    }
    keys.forEach(key => table.push([`'${key.char}'`, formatValue(key)]));
}
