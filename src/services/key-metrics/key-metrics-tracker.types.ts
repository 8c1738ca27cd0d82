export interface KeyMetric {
    /**
     * Response latencies in milliseconds, in the order they were observed
     */
    latencies: number[];

    /**
     * Number of mismatched attempts while this character was expected
     */
    errors: number;
}

export interface RankedKey {
    char: string;
    value: number;
}
