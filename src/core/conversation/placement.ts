import type { Turn } from './turn';

export interface PlacedTurn {
    readonly turn: Turn;
    /** Inclusive start, in samples from the timeline origin. May be negative on an invalid layout. */
    readonly beginSample: number;
    /** Exclusive end: `beginSample + duration`. */
    readonly endSample: number;
}

export function millisecondsToSamples(milliseconds: number, sampleRate: number): number {
    return Math.trunc((milliseconds * sampleRate) / 1000);
}

/**
 * Chain turns end-to-start: each turn begins `offset` after the previous turn ends.
 * `durationSamples` yields the per-channel length of a turn's track.
 */
export function placeTurns(
    turns: readonly Turn[],
    sampleRate: number,
    durationSamples: (turn: Turn) => number
): PlacedTurn[] {
    const placed: PlacedTurn[] = [];
    let previousEnd = 0;
    for (const turn of turns) {
        const beginSample = previousEnd + millisecondsToSamples(turn.offset, sampleRate);
        const endSample = beginSample + durationSamples(turn);
        placed.push({ turn, beginSample, endSample });
        previousEnd = endSample;
    }
    return placed;
}
