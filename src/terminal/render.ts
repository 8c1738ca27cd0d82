import chalk, { Chalk } from 'chalk';
import figlet from 'figlet';
import { max } from 'lodash';
import { AccuracyBand, SpeedBand } from '../services/heatmap/heatmap-color-mapper.types';
import { HeatmapColorMapper } from '../services/heatmap/heatmap-color-mapper';
import { KeyMetricsTracker } from '../services/key-metrics/key-metrics-tracker';
import { SessionSnapshot } from '../services/session/session-engine.types';
import { WpmSample } from '../services/wpm/wpm-sampler.types';
import { WpmSampler } from '../services/wpm/wpm-sampler';
import { formatSeconds, getTableOfKeyAccuracy, getTableOfKeySpeed, getTableOfResults } from '../utils/utils';

export const VISIBLE_CHAR_LIMIT = 300;

const KEYBOARD_ROWS: readonly { keys: string, indent: string }[] = [
    { keys: 'qwertyuiop', indent: '  ' },
    { keys: 'asdfghjkl', indent: '   ' },
    { keys: 'zxcvbnm', indent: '     ' }
];

const TREND_LEVELS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

const speedBandStyles: Record<SpeedBand, Chalk> = {
    [SpeedBand.Fastest]: chalk.black.bgGreen,
    [SpeedBand.Fast]: chalk.black.bgHex('#90EE90'),
    [SpeedBand.Medium]: chalk.black.bgYellow,
    [SpeedBand.Slow]: chalk.black.bgHex('#FF6347'),
    [SpeedBand.Slowest]: chalk.black.bgRed,
    [SpeedBand.NoData]: chalk.black.bgHex('#808080'),
    [SpeedBand.Unused]: chalk.black.bgHex('#404040')
};

const accuracyBandStyles: Record<AccuracyBand, Chalk> = {
    [AccuracyBand.Highest]: chalk.black.bgGreen,
    [AccuracyBand.High]: chalk.black.bgHex('#90EE90'),
    [AccuracyBand.Medium]: chalk.black.bgYellow,
    [AccuracyBand.Low]: chalk.black.bgHex('#FF6347'),
    [AccuracyBand.Lowest]: chalk.black.bgRed,
    [AccuracyBand.NoData]: chalk.black.bgHex('#808080'),
    [AccuracyBand.Unused]: chalk.black.bgHex('#404040')
};

export interface SummaryView {
    snapshot: SessionSnapshot;
    keyMetrics: KeyMetricsTracker;
    wpmSampler: WpmSampler;
    heatmap: HeatmapColorMapper;
    historyWarning?: string;
}

export function renderTypingScreen(snapshot: SessionSnapshot, columns: number) : string
{
    const lines: string[] = [];

    lines.push(centre(chalk.yellow(formatSeconds(snapshot.remainingMs)), formatSeconds(snapshot.remainingMs).length, columns));
    lines.push('');

    const visible = snapshot.targetChars.slice(0, VISIBLE_CHAR_LIMIT);
    for (const [start, end] of wrapPositions(visible, Math.max(10, columns - 2))) {
        let line = '';
        for (let i = start; i < end; i++) {
            line += styleTargetChar(snapshot, i)(snapshot.targetChars[i]);
        }
        lines.push(line);
    }

    lines.push('');
    const stats = formatStatsLine(snapshot);
    lines.push(centre(chalk.cyan(stats), stats.length, columns));

    return lines.join('\n');
}

export function renderSummaryScreen(view: SummaryView, columns: number) : string
{
    const sections: string[] = [];

    sections.push(chalk.green(figlet.textSync('Complete!', { horizontalLayout: 'full', width: columns })));
    sections.push(getTableOfResults(view.snapshot, view.wpmSampler));
    sections.push(joinColumns(
        [getTableOfKeySpeed(view.keyMetrics), 'Speed Heatmap:', renderSpeedKeyboard(view.heatmap)].join('\n'),
        [getTableOfKeyAccuracy(view.keyMetrics), 'Accuracy Heatmap:', renderAccuracyKeyboard(view.heatmap)].join('\n')
    ));

    const samples = view.wpmSampler.samples();
    if (samples.length > 0) {
        sections.push(`WPM Performance: ${chalk.cyan(renderWpmTrend(samples, Math.max(10, columns - 20)))}`);
    }

    if (view.historyWarning) {
        sections.push(chalk.yellow(`Warning: ${view.historyWarning}`));
    }

    sections.push(chalk.yellow('Press ESC to exit or ENTER to restart'));

    return sections.join('\n\n');
}

export function formatStatsLine(snapshot: SessionSnapshot) : string
{
    return `WPM: ${Math.round(snapshot.currentWpm)} | Accuracy: ${Math.round(snapshot.accuracy)}%`;
}

export function renderSpeedKeyboard(heatmap: HeatmapColorMapper) : string
{
    return renderKeyboard(key => speedBandStyles[heatmap.speedBand(key)]);
}

export function renderAccuracyKeyboard(heatmap: HeatmapColorMapper) : string
{
    return renderKeyboard(key => accuracyBandStyles[heatmap.accuracyBand(key)]);
}

/**
 * One block per sample, scaled against the highest reading (at least 60 WPM
 * so a slow session does not look like a full bar)
 */
export function renderWpmTrend(samples: readonly WpmSample[], width: number) : string
{
    const shown = samples.slice(-width);
    const ceiling = Math.max(60, max(shown.map(s => s.wpm)) ?? 0);
    return shown
        .map(s => TREND_LEVELS[Math.min(TREND_LEVELS.length - 1, Math.floor(s.wpm / ceiling * (TREND_LEVELS.length - 1)))])
        .join('');
}

/**
 * Splits characters into [start, end) ranges of at most `width`, breaking
 * after the last space that fits. Words longer than a line are split.
 */
export function wrapPositions(chars: readonly string[], width: number) : [number, number][]
{
    const ranges: [number, number][] = [];
    let start = 0;
    while (start < chars.length) {
        let end = Math.min(chars.length, start + width);
        if (end < chars.length) {
            const lastSpace = chars.lastIndexOf(' ', end - 1);
            if (lastSpace >= start)
                end = lastSpace + 1;
        }
        ranges.push([start, end]);
        start = end;
    }
    return ranges;
}

function styleTargetChar(snapshot: SessionSnapshot, index: number) : Chalk
{
    if (index < snapshot.typedEcho.length) {
        if (snapshot.typedEcho[index] !== snapshot.targetChars[index])
            return chalk.red;
        // Typed correctly, orange if it took a retry
        return snapshot.correctionMarks[index] ? chalk.hex('#FFA500') : chalk.green;
    }
    if (index === snapshot.cursor)
        return chalk.black.bgWhite;
    return chalk.gray;
}

function renderKeyboard(styleOf: (key: string) => Chalk) : string
{
    return KEYBOARD_ROWS.map(row =>
        row.indent + Array.from(row.keys).map(key => styleOf(key)(` ${key} `)).join(' ')
    ).join('\n');
}

function centre(text: string, visibleLength: number, columns: number) : string
{
    return ' '.repeat(Math.max(0, Math.floor((columns - visibleLength) / 2))) + text;
}

// Places two multi-line blocks side by side, padding the left one
function joinColumns(left: string, right: string) : string
{
    const leftLines = left.split('\n');
    const rightLines = right.split('\n');
    const leftWidth = max(leftLines.map(visibleLength)) ?? 0;
    const height = Math.max(leftLines.length, rightLines.length);

    const rows: string[] = [];
    for (let i = 0; i < height; i++) {
        const l = leftLines[i] ?? '';
        const r = rightLines[i] ?? '';
        rows.push(l + ' '.repeat(leftWidth - visibleLength(l) + 4) + r);
    }
    return rows.join('\n');
}

function visibleLength(text: string) : number
{
    // Strip ANSI colour codes before measuring
    return Array.from(text.replace(/\u001b\[[0-9;]*m/g, '')).length;
}
