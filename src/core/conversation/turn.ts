// A single scheduled utterance. `offset` is in milliseconds, measured from the end of the
// previous turn (or from the origin for the first turn); negative values overlap the predecessor.
export interface Turn {
    readonly speakerName: string;
    readonly audioTrackName: string;
    readonly offset: number;
}

export function createTurn(speakerName: string, audioTrackName: string, offset: number): Turn {
    if (!Number.isSafeInteger(offset)) {
        throw new TypeError(`Turn offset must be an integer number of milliseconds, got ${offset}`);
    }
    return Object.freeze({ speakerName, audioTrackName, offset });
}

export function turnsEqual(a: Turn, b: Turn): boolean {
    return a.speakerName === b.speakerName && a.audioTrackName === b.audioTrackName && a.offset === b.offset;
}

export function describeTurn(turn: Turn, index?: number): string {
    const prefix = index === undefined ? '' : `#${index} `;
    return `${prefix}${turn.speakerName}/${turn.audioTrackName}@${turn.offset}ms`;
}
