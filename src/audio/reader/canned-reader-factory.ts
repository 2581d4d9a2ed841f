import { basename } from 'path';
import {
    assertValidTrackParams,
    type AudioTrackParams,
    type AudioTrackReader,
    type AudioTrackReaderFactory,
} from './audio-track-reader';

class SilentTrackReader implements AudioTrackReader {
    readonly sampleRate: number;
    readonly channelCount: number;
    readonly sampleCount: number;
    private cursor = 0;

    constructor(params: AudioTrackParams) {
        this.sampleRate = params.sampleRate;
        this.channelCount = params.channelCount;
        this.sampleCount = params.sampleCount;
    }

    readSamples(target: Float32Array): number {
        const remaining = this.sampleCount * this.channelCount - this.cursor;
        const count = Math.max(0, Math.min(target.length, remaining));
        target.fill(0, 0, count);
        this.cursor += count;
        return count;
    }
}

/**
 * Reader factory returning canned track parameters keyed by file basename, with a default
 * for names it does not know. Every requested path is recorded in `createdPaths`.
 */
export class CannedAudioTrackReaderFactory implements AudioTrackReaderFactory {
    readonly createdPaths: string[] = [];
    private readonly defaults: AudioTrackParams;
    private readonly byName: ReadonlyMap<string, AudioTrackParams>;

    constructor(defaults: AudioTrackParams, byName: Record<string, AudioTrackParams> = {}) {
        assertValidTrackParams(defaults, 'default track params');
        for (const [name, params] of Object.entries(byName)) {
            assertValidTrackParams(params, `track params for ${name}`);
        }
        this.defaults = { ...defaults };
        this.byName = new Map(Object.entries(byName));
    }

    create(path: string): AudioTrackReader {
        this.createdPaths.push(path);
        const params = this.byName.get(basename(path)) ?? this.defaults;
        return new SilentTrackReader(params);
    }
}
