import type { PlacedTurn } from './placement';

export const MAX_CONCURRENT_TURNS = 2;

export type OverlapKind = 'self-overlap' | 'concurrency';

export interface OverlapViolation {
    kind: OverlapKind;
    /** Sample position of the start event that produced the violation. */
    atSample: number;
    /**
     * Turn indices, ascending: the starting turn plus the turns it collides with
     * (one same-speaker turn, or the first MAX_CONCURRENT_TURNS still active).
     */
    turnIndices: number[];
}

interface SweepEvent {
    time: number;
    kind: 'end' | 'start';
    index: number;
}

function compareEvents(a: SweepEvent, b: SweepEvent): number {
    if (a.time !== b.time) return a.time - b.time;
    // Ends first, so a turn starting exactly where another stops is not counted as overlapping.
    if (a.kind !== b.kind) return a.kind === 'end' ? -1 : 1;
    return a.index - b.index;
}

function firstOf(indices: Iterable<number>, count: number): number[] {
    const picked: number[] = [];
    for (const index of indices) {
        if (picked.length === count) break;
        picked.push(index);
    }
    return picked;
}

/**
 * Sweep over `[begin, end)` intervals. A self-overlap is reported for each start event whose speaker
 * is already active; a concurrency violation only when the active count rises above MAX_CONCURRENT_TURNS,
 * not for every start while it stays above. Empty intervals are skipped.
 */
export function findOverlapViolations(turns: readonly PlacedTurn[]): OverlapViolation[] {
    const events: SweepEvent[] = [];
    turns.forEach((placed, index) => {
        if (placed.endSample <= placed.beginSample) return;
        events.push({ time: placed.beginSample, kind: 'start', index });
        events.push({ time: placed.endSample, kind: 'end', index });
    });
    events.sort(compareEvents);

    const violations: OverlapViolation[] = [];
    const active = new Set<number>();
    const activeBySpeaker = new Map<string, Set<number>>();
    for (const event of events) {
        const speaker = turns[event.index].turn.speakerName;
        let speaking = activeBySpeaker.get(speaker);
        if (event.kind === 'end') {
            active.delete(event.index);
            speaking?.delete(event.index);
            continue;
        }
        if (!speaking) {
            speaking = new Set<number>();
            activeBySpeaker.set(speaker, speaking);
        }
        if (speaking.size > 0) {
            violations.push({
                kind: 'self-overlap',
                atSample: event.time,
                turnIndices: [...firstOf(speaking, 1), event.index].sort((a, b) => a - b),
            });
        }
        if (active.size === MAX_CONCURRENT_TURNS) {
            violations.push({
                kind: 'concurrency',
                atSample: event.time,
                turnIndices: [...firstOf(active, MAX_CONCURRENT_TURNS), event.index].sort((a, b) => a - b),
            });
        }
        active.add(event.index);
        speaking.add(event.index);
    }
    return violations;
}
