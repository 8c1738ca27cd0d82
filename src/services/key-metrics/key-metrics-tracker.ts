import { mean, orderBy, take } from 'lodash';
import { KeyMetric, RankedKey } from './key-metrics-tracker.types';

/**
 * Accumulates per-character latency samples and error counts. Metrics are
 * keyed by the character that was expected at the time of the attempt, never
 * by the character that was actually typed.
 *
 * Rankings sort with lodash's stable orderBy over the map's insertion order,
 * so characters with equal values keep the order in which they were first
 * observed.
 */
export class KeyMetricsTracker
{
    private metrics: Map<string, KeyMetric> = new Map<string, KeyMetric>();

    public recordAttempt(expectedChar: string, latencyMs: number): void {
        this.metricFor(expectedChar).latencies.push(Math.max(0, latencyMs));
    }

    public recordError(expectedChar: string): void {
        this.metricFor(expectedChar).errors += 1;
    }

    public get(char: string): Readonly<KeyMetric> | undefined {
        return this.metrics.get(char);
    }

    public meanLatency(char: string): number | undefined {
        const metric = this.metrics.get(char);
        if (! metric || metric.latencies.length === 0)
            return undefined;
        return mean(metric.latencies);
    }

    // Fraction in [0, 1], undefined until the character has a latency sample
    public accuracy(char: string): number | undefined {
        const metric = this.metrics.get(char);
        if (! metric || metric.latencies.length === 0)
            return undefined;
        const attempts = metric.latencies.length;
        return Math.max(0, attempts - metric.errors) / attempts;
    }

    public meanLatencies(): number[] {
        return this.rankable(char => this.meanLatency(char)).map(k => k.value);
    }

    public fastest(count: number): RankedKey[] {
        return take(orderBy(this.rankable(char => this.meanLatency(char)), ['value'], ['asc']), count);
    }

    public slowest(count: number): RankedKey[] {
        return take(orderBy(this.rankable(char => this.meanLatency(char)), ['value'], ['desc']), count);
    }

    public mostErrorProne(count: number): RankedKey[] {
        const errorProne = this.rankable(char => {
            const errors = this.metrics.get(char)?.errors ?? 0;
            return errors > 0 ? errors : undefined;
        });
        return take(orderBy(errorProne, ['value'], ['desc']), count);
    }

    public mostAccurate(count: number): RankedKey[] {
        return take(orderBy(this.rankable(char => this.accuracy(char)), ['value'], ['desc']), count);
    }

    private rankable(valueOf: (char: string) => number | undefined): RankedKey[] {
        const result: RankedKey[] = [];
        for (const char of this.metrics.keys()) {
            const value = valueOf(char);
            if (value !== undefined)
                result.push({ char, value });
        }
        return result;
    }

    private metricFor(char: string): KeyMetric {
        let metric = this.metrics.get(char);
        if (! metric) {
            metric = { latencies: [], errors: 0 };
            this.metrics.set(char, metric);
        }
        return metric;
    }
}
