import type { AudioTrackReader, AudioTrackReaderFactory } from '@audio/reader/audio-track-reader';
import { resolveAudioTrackReaders } from '@audio/reader/reader-cache';
import { debugLog } from '@utils/debug-log';
import { isTestEnvironment } from '@utils/env';
import { placeTurns, type PlacedTurn } from './placement';
import { validateSpeakingTurns, type TimelineIssue } from './timeline-validation';
import type { Turn } from './turn';

export type TimelineBuildErrorCode = 'ERR_SAMPLE_RATE_MISMATCH' | 'ERR_TRACK_UNRESOLVED';

export class TimelineBuildError extends Error {
    public readonly code: TimelineBuildErrorCode;

    constructor(code: TimelineBuildErrorCode, message: string) {
        super(message);
        this.name = 'TimelineBuildError';
        this.code = code;
    }
}

function resolveSampleRate(readers: ReadonlyMap<string, AudioTrackReader>): number | null {
    let sampleRate: number | null = null;
    let firstTrack = '';
    for (const [name, reader] of readers) {
        if (sampleRate === null) {
            sampleRate = reader.sampleRate;
            firstTrack = name;
        } else if (reader.sampleRate !== sampleRate) {
            throw new TimelineBuildError(
                'ERR_SAMPLE_RATE_MISMATCH',
                `Track ${name} is sampled at ${reader.sampleRate} Hz but ${firstTrack} at ${sampleRate} Hz`
            );
        }
    }
    return sampleRate;
}

/**
 * Absolute placement of an ordered turn sequence, plus the verdict on whether the layout is
 * plausible. Immutable once built. Timing fields are meaningful only when `valid()`.
 */
export class ConversationTimeline {
    private constructor(
        private readonly turns: readonly PlacedTurn[],
        private readonly speakers: ReadonlySet<string>,
        private readonly readers: ReadonlyMap<string, AudioTrackReader>,
        private readonly rate: number | null,
        private readonly findings: readonly TimelineIssue[],
        private readonly durationSamples: number
    ) {}

    /**
     * Throws only when a track cannot be opened or the tracks disagree on sample rate.
     * An implausible layout still builds; check `valid()`.
     */
    static build(
        turns: readonly Turn[],
        trackDirectory: string,
        readerFactory: AudioTrackReaderFactory
    ): ConversationTimeline {
        const readers = resolveAudioTrackReaders(turns, trackDirectory, readerFactory);
        const sampleRate = resolveSampleRate(readers) ?? 0;

        const placed = placeTurns(turns, sampleRate, (turn) => {
            const reader = readers.get(turn.audioTrackName);
            if (!reader) {
                throw new TimelineBuildError('ERR_TRACK_UNRESOLVED', `No reader for track ${turn.audioTrackName}`);
            }
            return reader.sampleCount;
        });

        const { ok, issues } = validateSpeakingTurns(placed);
        if (!ok && !isTestEnvironment()) {
            for (const finding of issues) {
                console.warn(`[conversationTimeline] ${finding.code}: ${finding.message}`);
            }
        }

        const speakers = new Set(turns.map((turn) => turn.speakerName));
        const duration = placed.reduce((max, p) => Math.max(max, p.endSample), 0);
        debugLog('[conversationTimeline] built', {
            turns: placed.length,
            speakers: speakers.size,
            tracks: readers.size,
            valid: ok,
            durationSamples: duration,
        });

        return new ConversationTimeline(
            Object.freeze(placed),
            speakers,
            readers,
            readers.size > 0 ? sampleRate : null,
            Object.freeze(issues),
            duration
        );
    }

    valid(): boolean {
        return this.findings.length === 0;
    }

    issues(): readonly TimelineIssue[] {
        return this.findings;
    }

    speakerNames(): ReadonlySet<string> {
        return this.speakers;
    }

    audioTrackReaders(): ReadonlyMap<string, AudioTrackReader> {
        return this.readers;
    }

    speakingTurns(): readonly PlacedTurn[] {
        return this.turns;
    }

    totalDurationSamples(): number {
        return this.durationSamples;
    }

    sampleRate(): number | null {
        return this.rate;
    }
}

export function buildConversationTimeline(
    turns: readonly Turn[],
    trackDirectory: string,
    readerFactory: AudioTrackReaderFactory
): ConversationTimeline {
    return ConversationTimeline.build(turns, trackDirectory, readerFactory);
}
