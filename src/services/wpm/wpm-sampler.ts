import { clamp, last, max, mean } from 'lodash';
import {
    CHARS_PER_WORD,
    ELAPSED_EPSILON_SECONDS,
    INITIAL_WPM_DELAY_SECONDS,
    MAX_WPM_CAP,
    WPM_UPDATE_INTERVAL_SECONDS,
    WpmSample
} from './wpm-sampler.types';

export class WpmSampler
{
    private history: WpmSample[] = [];

    /**
     * Takes a reading if the warm-up delay has passed and at least
     * WPM_UPDATE_INTERVAL_SECONDS separate it from the previous reading.
     * @param elapsedSeconds Seconds since the session started
     * @param cursor Number of characters advanced so far
     * @returns The new sample, or undefined when a gate rejected it
     */
    public maybeSample(elapsedSeconds: number, cursor: number): WpmSample | undefined {
        if (elapsedSeconds < INITIAL_WPM_DELAY_SECONDS - ELAPSED_EPSILON_SECONDS)
            return undefined;

        const previous = last(this.history);
        if (previous && elapsedSeconds - previous.elapsedSeconds < WPM_UPDATE_INTERVAL_SECONDS - ELAPSED_EPSILON_SECONDS)
            return undefined;

        const words = cursor / CHARS_PER_WORD;
        const wpm = clamp(words / (elapsedSeconds / 60), 0, MAX_WPM_CAP);

        const sample: WpmSample = { elapsedSeconds, wpm };
        this.history.push(sample);
        return sample;
    }

    public current(): number {
        return last(this.history)?.wpm ?? 0;
    }

    public average(): number {
        if (this.history.length === 0)
            return 0;
        return mean(this.history.map(s => s.wpm));
    }

    public peak(): number {
        return max(this.history.map(s => s.wpm)) ?? 0;
    }

    public samples(): readonly WpmSample[] {
        return this.history;
    }
}
