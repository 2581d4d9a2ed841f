/**
 * Timeline validation – plausibility checks on placed turns.
 *
 * Issue codes:
 *  - ERR_NEGATIVE_START   first turn starts before the origin
 *  - ERR_START_REGRESSION a turn starts before its predecessor in sequence order
 *  - ERR_SELF_OVERLAP     one speaker is active on two turns at once
 *  - ERR_CONCURRENCY      more than two turns are active at once
 *
 * An invalid layout is a normal outcome: it is reported through `ok: false` and never thrown.
 */
import { describeTurn } from './turn';
import type { PlacedTurn } from './placement';
import { findOverlapViolations, MAX_CONCURRENT_TURNS } from './overlap-sweep';

export type TimelineIssueCode =
    | 'ERR_NEGATIVE_START'
    | 'ERR_START_REGRESSION'
    | 'ERR_SELF_OVERLAP'
    | 'ERR_CONCURRENCY';

export interface TimelineIssue {
    code: TimelineIssueCode;
    message: string;
    turnIndices: number[];
}

export interface TimelineValidationResult {
    ok: boolean;
    issues: TimelineIssue[];
}

function issue(code: TimelineIssueCode, message: string, turnIndices: number[]): TimelineIssue {
    return { code, message, turnIndices };
}

function listTurns(turns: readonly PlacedTurn[], indices: number[]): string {
    return indices.map((i) => describeTurn(turns[i].turn, i)).join(', ');
}

export function validateSpeakingTurns(turns: readonly PlacedTurn[]): TimelineValidationResult {
    const issues: TimelineIssue[] = [];

    // The offset sign is checked too: below 1 kHz a small negative offset truncates to sample 0.
    if (turns.length > 0 && (turns[0].beginSample < 0 || turns[0].turn.offset < 0)) {
        issues.push(
            issue(
                'ERR_NEGATIVE_START',
                `First turn ${describeTurn(turns[0].turn, 0)} starts before the origin`,
                [0]
            )
        );
    }

    for (let n = 1; n < turns.length; n++) {
        if (turns[n].beginSample < turns[n - 1].beginSample) {
            issues.push(
                issue(
                    'ERR_START_REGRESSION',
                    `Turn ${describeTurn(turns[n].turn, n)} starts before turn ${describeTurn(turns[n - 1].turn, n - 1)}`,
                    [n - 1, n]
                )
            );
        }
    }

    for (const violation of findOverlapViolations(turns)) {
        if (violation.kind === 'self-overlap') {
            issues.push(
                issue(
                    'ERR_SELF_OVERLAP',
                    `Speaker ${turns[violation.turnIndices[0]].turn.speakerName} talks over themself at sample ${violation.atSample}: ${listTurns(turns, violation.turnIndices)}`,
                    violation.turnIndices
                )
            );
        } else {
            issues.push(
                issue(
                    'ERR_CONCURRENCY',
                    `More than ${MAX_CONCURRENT_TURNS} turns active at sample ${violation.atSample}: ${listTurns(turns, violation.turnIndices)}`,
                    violation.turnIndices
                )
            );
        }
    }

    return { ok: issues.length === 0, issues };
}
