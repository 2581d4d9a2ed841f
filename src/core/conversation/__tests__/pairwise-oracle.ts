import type { PlacedTurn } from '../placement';

// Quadratic reference checks used to cross-validate the sweep line.

function isEmpty(p: PlacedTurn): boolean {
    return p.endSample <= p.beginSample;
}

export function hasSelfOverlapPairwise(turns: readonly PlacedTurn[]): boolean {
    for (let i = 0; i < turns.length; i++) {
        for (let j = i + 1; j < turns.length; j++) {
            const a = turns[i];
            const b = turns[j];
            if (isEmpty(a) || isEmpty(b) || a.turn.speakerName !== b.turn.speakerName) continue;
            if (Math.max(a.beginSample, b.beginSample) < Math.min(a.endSample, b.endSample)) return true;
        }
    }
    return false;
}

// Peak coverage is always reached at some interval start.
export function maxConcurrencyPairwise(turns: readonly PlacedTurn[]): number {
    let peak = 0;
    for (const probe of turns) {
        if (isEmpty(probe)) continue;
        const t = probe.beginSample;
        const covering = turns.filter((p) => !isEmpty(p) && p.beginSample <= t && t < p.endSample).length;
        peak = Math.max(peak, covering);
    }
    return peak;
}
