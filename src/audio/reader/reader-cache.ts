import { join } from 'path';
import type { Turn } from '@core/conversation/turn';
import { debugLog } from '@utils/debug-log';
import { assertValidTrackParams, type AudioTrackReader, type AudioTrackReaderFactory } from './audio-track-reader';

/**
 * Open one reader per distinct track name, in order of first appearance. Turns that share a
 * track name share the reader instance. A reader whose rate, channel count or sample count is
 * out of range fails with RangeError. If the factory throws, the error propagates and the
 * readers opened so far are dropped along with the partial map.
 */
export function resolveAudioTrackReaders(
    turns: readonly Turn[],
    trackDirectory: string,
    factory: AudioTrackReaderFactory
): ReadonlyMap<string, AudioTrackReader> {
    const readers = new Map<string, AudioTrackReader>();
    for (const turn of turns) {
        if (readers.has(turn.audioTrackName)) continue;
        const path = join(trackDirectory, turn.audioTrackName);
        const reader = factory.create(path);
        assertValidTrackParams(reader, path);
        readers.set(turn.audioTrackName, reader);
        debugLog('[audioTrackReaders] opened', path);
    }
    return readers;
}
