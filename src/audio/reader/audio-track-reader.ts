// Reader capability for a single audio track. Durations are per-channel frame counts.

export interface AudioTrackParams {
    sampleRate: number;
    channelCount: number;
    sampleCount: number;
}

export interface AudioTrackReader extends Readonly<AudioTrackParams> {
    /**
     * Fill `target` with interleaved samples starting at the read cursor and advance it.
     * Returns the number of samples written; 0 once the stream is exhausted.
     */
    readSamples(target: Float32Array): number;
}

export interface AudioTrackReaderFactory {
    /** Open the track at `path`. Throws when the file is missing or cannot be decoded. */
    create(path: string): AudioTrackReader;
}

export function assertValidTrackParams(params: AudioTrackParams, source: string): void {
    if (!Number.isInteger(params.sampleRate) || params.sampleRate <= 0) {
        throw new RangeError(`${source}: sample rate must be a positive integer (got ${params.sampleRate})`);
    }
    if (!Number.isInteger(params.channelCount) || params.channelCount <= 0) {
        throw new RangeError(`${source}: channel count must be a positive integer (got ${params.channelCount})`);
    }
    if (!Number.isInteger(params.sampleCount) || params.sampleCount < 0) {
        throw new RangeError(`${source}: sample count must be a non-negative integer (got ${params.sampleCount})`);
    }
}
